import { MAX_SPEECH_CHARS } from '../constants';
import type { SpeechBackend, SpeechRequest } from '../types';
import { requestSpeech } from './geminiService';
import { chunkText } from './textChunker';

/**
 * Voices one dialogue line. Long text is split into chunks that are
 * synthesized one after another and concatenated in chunk order.
 * Backend failures are not caught here.
 */
export const synthesizeSpeech = async (
  request: SpeechRequest,
  backend: SpeechBackend = requestSpeech
): Promise<Buffer> => {
  const chunks = chunkText(request.text, MAX_SPEECH_CHARS);
  if (chunks.length > 1) {
    console.log(`[Synthesizer] Splitting ${request.text.length} characters into ${chunks.length} chunks`);
  }

  const parts: Uint8Array[] = [];
  for (const chunk of chunks) {
    parts.push(await backend({ ...request, text: chunk }));
  }

  return Buffer.concat(parts);
};
