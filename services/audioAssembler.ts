import type { Dialogue, RenderResult, RenderedAudio, SpeechBackend, VoiceConfig } from '../types';
import { sweepStaleArtifacts, writeAudioArtifact } from './audioUtils';
import { InputError } from './errors';
import { synthesizeSpeech } from './speechSynthesizer';
import { mapWithConcurrency } from './workerPool';

export const DEFAULT_CONCURRENCY = 8;

export interface AssembleOptions {
  backend?: SpeechBackend;
  concurrency?: number;
}

export interface RenderOptions extends AssembleOptions {
  outputDir: string;
}

export const formatTranscriptLine = (line: Dialogue['lines'][number]): string => `${line.speaker}: ${line.text}`;

/**
 * Voices every line of the dialogue concurrently and joins audio and
 * transcript in line order. Any failed line fails the whole render.
 */
export const assembleDialogueAudio = async (
  dialogue: Dialogue,
  voiceConfig: VoiceConfig,
  options: AssembleOptions = {}
): Promise<RenderResult> => {
  const { backend, concurrency = DEFAULT_CONCURRENCY } = options;
  if (dialogue.lines.length === 0) {
    throw new InputError('The dialogue has no lines to render.');
  }

  const segments = await mapWithConcurrency(dialogue.lines, concurrency, line => {
    const { voice, instructions } = voiceConfig.speakers[line.speaker];
    return synthesizeSpeech(
      {
        text: line.text,
        voice,
        audioModel: voiceConfig.audioModel,
        credentials: voiceConfig.credentials,
        styleInstructions: instructions,
      },
      backend
    );
  });

  let transcript = '';
  let characterCount = 0;
  for (const line of dialogue.lines) {
    transcript += `${formatTranscriptLine(line)}\n\n`;
    characterCount += line.text.length;
  }

  console.log(`[Assembler] Generated ${characterCount} characters of audio across ${dialogue.lines.length} lines`);

  return { audioBytes: Buffer.concat(segments), transcript, characterCount };
};

export const renderDialogue = async (
  dialogue: Dialogue,
  voiceConfig: VoiceConfig,
  options: RenderOptions
): Promise<RenderedAudio> => {
  const result = await assembleDialogueAudio(dialogue, voiceConfig, options);
  const audioPath = await writeAudioArtifact(result.audioBytes, options.outputDir);

  try {
    const removed = await sweepStaleArtifacts(options.outputDir);
    if (removed.length > 0) {
      console.log(`[Assembler] Removed ${removed.length} stale audio file(s)`);
    }
  } catch (error) {
    // Cleanup is best effort
    console.warn(`[Assembler] Could not sweep stale audio in ${options.outputDir}:`, error);
  }

  console.log(`[Assembler] Wrote ${audioPath}`);
  return { ...result, audioPath };
};
