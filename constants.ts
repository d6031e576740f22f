import type { ReasoningEffort } from './types';

export const VOICE_OPTIONS = [
  { id: 'Kore', label: 'Kore (Female, Firm)' },
  { id: 'Puck', label: 'Puck (Male, Upbeat)' },
  { id: 'Charon', label: 'Charon (Male, Informative)' },
  { id: 'Fenrir', label: 'Fenrir (Male, Excitable)' },
  { id: 'Zephyr', label: 'Zephyr (Female, Bright)' },
  { id: 'Aoede', label: 'Aoede (Female, Breezy)' },
  { id: 'Leda', label: 'Leda (Female, Youthful)' },
  { id: 'Orus', label: 'Orus (Male, Firm)' },
] as const;

// Models that accept a thinking budget
export const REASONING_TEXT_MODELS: readonly string[] = [
  'gemini-2.5-flash',
  'gemini-2.5-pro',
  'gemini-2.5-flash-lite',
];

export const REASONING_BUDGETS: Record<Exclude<ReasoningEffort, 'none'>, number> = {
  low: 1024,
  medium: 8192,
  high: 24576,
};

// Audio models that follow natural-language delivery notes
export const STYLE_CAPABLE_AUDIO_MODELS: readonly string[] = [
  'gemini-2.5-flash-preview-tts',
  'gemini-2.5-pro-preview-tts',
];

export const DEFAULT_TEXT_MODEL = 'gemini-2.5-flash';
export const DEFAULT_AUDIO_MODEL = 'gemini-2.5-flash-preview-tts';
export const DEFAULT_TEMPLATE = 'podcast';

export const DEFAULT_SPEAKER_VOICES = {
  'speaker-1': { voice: 'Kore', instructions: 'Speak in an emotive and friendly tone.' },
  'speaker-2': { voice: 'Puck', instructions: 'Speak in a friendly, but serious tone.' },
} as const;

// Synthesis input ceiling per request, with headroom below the backend limit
export const MAX_SPEECH_CHARS = 4000;

// Gemini TTS returns raw 16-bit little-endian mono PCM
export const PCM_SAMPLE_RATE = 24000;
export const PCM_CHANNELS = 1;
export const PCM_BITS_PER_SAMPLE = 16;

export const ARTIFACT_PREFIX = 'Docucast_';
export const ARTIFACT_MAX_AGE_MS = 24 * 60 * 60 * 1000;
export const TRANSCRIPT_TITLE = 'Docucast Transcript';
