import { GoogleGenAI, Modality, Type } from '@google/genai';
import type { GenerateContentConfig, GoogleGenAIOptions, Schema } from '@google/genai';
import { REASONING_BUDGETS, REASONING_TEXT_MODELS, STYLE_CAPABLE_AUDIO_MODELS } from '../constants';
import { SPEAKERS } from '../types';
import type { Credentials, DialogueBackend, SpeechBackend, TextModelOptions } from '../types';
import { decodeBase64 } from './audioUtils';

export const DIALOGUE_RESPONSE_SCHEMA: Schema = {
  type: Type.OBJECT,
  properties: {
    scratchpad: {
      type: Type.STRING,
      description: 'Brainstorming notes and outline written before the dialogue',
    },
    dialogue: {
      type: Type.ARRAY,
      items: {
        type: Type.OBJECT,
        properties: {
          speaker: { type: Type.STRING, enum: [...SPEAKERS] },
          text: { type: Type.STRING, description: 'What the speaker says, written to be read aloud' },
        },
        required: ['speaker', 'text'],
        propertyOrdering: ['speaker', 'text'],
      },
    },
  },
  required: ['scratchpad', 'dialogue'],
  propertyOrdering: ['scratchpad', 'dialogue'],
};

// Custom endpoints follow their own credential contract, so the key stays home.
// The empty key also stops the SDK from reading GEMINI_API_KEY itself.
export const resolveTextClientOptions = (options: TextModelOptions): GoogleGenAIOptions =>
  options.apiBase
    ? { apiKey: '', httpOptions: { baseUrl: options.apiBase } }
    : { apiKey: options.apiKey };

export const resolveSpeechClientOptions = (credentials: Credentials): GoogleGenAIOptions => ({
  apiKey: credentials.apiKey,
  ...(credentials.apiBase ? { httpOptions: { baseUrl: credentials.apiBase } } : {}),
});

export const buildDialogueConfig = (options: TextModelOptions): GenerateContentConfig => {
  const config: GenerateContentConfig = {
    responseMimeType: 'application/json',
    responseSchema: DIALOGUE_RESPONSE_SCHEMA,
  };

  const effort = options.reasoningEffort;
  if (!options.apiBase && effort && effort !== 'none' && REASONING_TEXT_MODELS.includes(options.model)) {
    config.thinkingConfig = { thinkingBudget: REASONING_BUDGETS[effort] };
  }

  return config;
};

// Director's note format understood by Gemini TTS: `<note>: "<text>"`
export const applyStyleInstructions = (text: string, instructions: string, audioModel: string): string => {
  const note = instructions.trim();
  if (!note || !STYLE_CAPABLE_AUDIO_MODELS.includes(audioModel)) return text;
  return `${note}: "${text}"`;
};

export const requestDialogueJson: DialogueBackend = async (prompt, options) => {
  const ai = new GoogleGenAI(resolveTextClientOptions(options));

  const response = await ai.models.generateContent({
    model: options.model,
    contents: prompt,
    config: buildDialogueConfig(options),
  });

  return response.text;
};

export const requestSpeech: SpeechBackend = async request => {
  const ai = new GoogleGenAI(resolveSpeechClientOptions(request.credentials));

  const response = await ai.models.generateContent({
    model: request.audioModel,
    contents: [{ parts: [{ text: applyStyleInstructions(request.text, request.styleInstructions, request.audioModel) }] }],
    config: {
      responseModalities: [Modality.AUDIO],
      speechConfig: {
        voiceConfig: {
          prebuiltVoiceConfig: { voiceName: request.voice },
        },
      },
    },
  });

  const audioData = response.candidates?.[0]?.content?.parts?.[0]?.inlineData?.data;
  if (!audioData) throw new Error('No audio generated');

  return decodeBase64(audioData);
};
