import { z } from 'zod';
import { SPEAKERS } from '../types';
import type { Dialogue, DialogueBackend, GenerationRequest } from '../types';
import { GenerationFailedError, SchemaValidationError } from './errors';
import { requestDialogueJson } from './geminiService';
import { buildDialoguePrompt, buildImprovementsBlock } from './promptBuilder';
import { withRetry } from './retry';

export const DialogueLineSchema = z.object({
  speaker: z.enum(SPEAKERS),
  text: z.string(),
});

export const DialogueResponseSchema = z.object({
  scratchpad: z.string(),
  dialogue: z.array(DialogueLineSchema).min(1),
});

export interface GenerateOptions {
  backend?: DialogueBackend;
  maxAttempts?: number;
  baseDelayMs?: number;
  debug?: boolean;
}

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 1000;

export const parseDialogueResponse = (raw: string | undefined): Dialogue => {
  if (!raw?.trim()) throw new SchemaValidationError('The text model returned an empty response');

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new SchemaValidationError('The text model returned malformed JSON', { cause: error });
  }

  const parsed = DialogueResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new SchemaValidationError(`The text model returned an invalid dialogue: ${parsed.error.message}`, {
      cause: parsed.error,
    });
  }

  return { scratchpad: parsed.data.scratchpad, lines: parsed.data.dialogue };
};

/**
 * Asks the text model for a dialogue and validates it. Invalid output is
 * retried with exponential backoff; once attempts run out a
 * GenerationFailedError is thrown. Other backend errors propagate as-is.
 */
export const generateDialogue = async (request: GenerationRequest, options: GenerateOptions = {}): Promise<Dialogue> => {
  const {
    backend = requestDialogueJson,
    maxAttempts = DEFAULT_MAX_ATTEMPTS,
    baseDelayMs = DEFAULT_RETRY_DELAY_MS,
    debug = false,
  } = options;

  if (debug) {
    console.debug('[Generator] Requested improvements:', buildImprovementsBlock(request.priorTranscript, request.userFeedback) || '(none)');
  }

  const prompt = buildDialoguePrompt(request.sourceText, request.template, request.priorTranscript, request.userFeedback);

  try {
    const dialogue = await withRetry(async () => parseDialogueResponse(await backend(prompt, request.model)), {
      attempts: maxAttempts,
      baseDelayMs,
      shouldRetry: error => error instanceof SchemaValidationError,
      onRetry: (error, attempt, delayMs) => {
        console.warn(`[Generator] Attempt ${attempt}/${maxAttempts} failed validation, retrying in ${delayMs}ms:`, error);
      },
    });
    console.log(`[Generator] Generated dialogue with ${dialogue.lines.length} lines using ${request.model.model}`);
    return dialogue;
  } catch (error) {
    if (error instanceof SchemaValidationError) {
      throw new GenerationFailedError('schemaInvalid', maxAttempts, error);
    }
    throw error;
  }
};
