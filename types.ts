export const SPEAKERS = ['speaker-1', 'speaker-2'] as const;

export type Speaker = typeof SPEAKERS[number];

export interface DialogueLine {
  readonly speaker: Speaker;
  readonly text: string;
}

export interface Dialogue {
  readonly scratchpad: string; // Model reasoning only, never voiced
  readonly lines: readonly DialogueLine[];
}

// Row shape used by the line-by-line editor
export interface DialogueTableRow {
  Speaker: string;
  Line: string;
}

export interface TemplateFields {
  intro: string;
  textAnalysis: string;
  scratchpad: string;
  prelude: string;
  dialogueInstructions: string;
}

export type ReasoningEffort = 'none' | 'low' | 'medium' | 'high';

export interface TextModelOptions {
  model: string;
  apiBase?: string;
  apiKey?: string;
  reasoningEffort?: ReasoningEffort;
}

export interface Credentials {
  apiKey?: string;
  apiBase?: string;
}

export interface SpeakerVoice {
  voice: string;
  instructions: string;
}

export interface VoiceConfig {
  audioModel: string;
  credentials: Credentials;
  speakers: Record<Speaker, SpeakerVoice>;
}

export interface SpeechRequest {
  text: string;
  voice: string;
  audioModel: string;
  credentials: Credentials;
  styleInstructions: string;
}

export interface RenderResult {
  audioBytes: Buffer;
  transcript: string;
  characterCount: number;
}

export interface RenderedAudio extends RenderResult {
  audioPath: string;
}

export interface GenerationRequest {
  sourceText: string;
  template: TemplateFields;
  model: TextModelOptions;
  priorTranscript?: string;
  userFeedback?: string;
}

// Backend seams: the Gemini implementations live in services/geminiService.ts
export type SpeechBackend = (request: SpeechRequest) => Promise<Uint8Array>;

export type DialogueBackend = (prompt: string, options: TextModelOptions) => Promise<string | undefined>;

export type AppState = 'IDLE' | 'GENERATING' | 'SYNTHESIZING' | 'ERROR';
