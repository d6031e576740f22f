import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { DEFAULT_AUDIO_MODEL, DEFAULT_TEXT_MODEL } from './constants';
import { DEFAULT_CONCURRENCY } from './services/audioAssembler';
import { DEFAULT_MAX_ATTEMPTS } from './services/dialogueGenerator';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform(value => value || undefined);

const EnvSchema = z.object({
  GEMINI_API_KEY: optionalString,
  API_KEY: optionalString,
  DOCUCAST_API_BASE: optionalString,
  DOCUCAST_TEXT_MODEL: z.string().trim().min(1).default(DEFAULT_TEXT_MODEL),
  DOCUCAST_AUDIO_MODEL: z.string().trim().min(1).default(DEFAULT_AUDIO_MODEL),
  DOCUCAST_OUTPUT_DIR: optionalString,
  DOCUCAST_CONCURRENCY: z.coerce.number().int().positive().default(DEFAULT_CONCURRENCY),
  DOCUCAST_MAX_ATTEMPTS: z.coerce.number().int().positive().default(DEFAULT_MAX_ATTEMPTS),
});

export interface AppConfig {
  apiKey?: string;
  apiBase?: string;
  textModel: string;
  audioModel: string;
  outputDir: string;
  concurrency: number;
  maxAttempts: number;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.parse(env);
  return {
    apiKey: parsed.GEMINI_API_KEY ?? parsed.API_KEY,
    apiBase: parsed.DOCUCAST_API_BASE,
    textModel: parsed.DOCUCAST_TEXT_MODEL,
    audioModel: parsed.DOCUCAST_AUDIO_MODEL,
    outputDir: parsed.DOCUCAST_OUTPUT_DIR ?? join(tmpdir(), 'docucast'),
    concurrency: parsed.DOCUCAST_CONCURRENCY,
    maxAttempts: parsed.DOCUCAST_MAX_ATTEMPTS,
  };
};
