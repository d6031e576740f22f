import type { AppConfig } from './config';
import { DEFAULT_SPEAKER_VOICES } from './constants';
import { renderDialogue } from './services/audioAssembler';
import { generateDialogue } from './services/dialogueGenerator';
import {
  DialogueSession,
  dialogueToPlainTranscript,
  dialogueToTable,
  saveDialogueMarkdown,
} from './services/dialogueSession';
import { AppError, InputError, SynthesisError } from './services/errors';
import type { ErrorCode } from './services/errors';
import { getTemplate } from './services/templates';
import type {
  Dialogue,
  DialogueBackend,
  DialogueTableRow,
  ReasoningEffort,
  SpeakerVoice,
  Speaker,
  SpeechBackend,
  TemplateFields,
  VoiceConfig,
} from './types';

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: { code: ErrorCode; message: string } };

export interface RenderSettings {
  audioModel?: string;
  voices?: Partial<Record<Speaker, Partial<SpeakerVoice>>>;
  apiKey?: string;
  apiBase?: string;
}

export interface GenerationSettings extends RenderSettings {
  // Preset name or caller-edited fields
  template: string | TemplateFields;
  textModel?: string;
  reasoningEffort?: ReasoningEffort;
  debug?: boolean;
}

export interface RegenerateInput {
  userFeedback?: string;
  // Replaces the session transcript sent back to the model
  editedTranscript?: string;
  includeTranscript?: boolean;
}

export interface AudioOutput {
  audioPath: string;
  transcript: string;
  characterCount: number;
}

export interface GenerationOutput extends AudioOutput {
  sourceText: string;
  dialogue: Dialogue;
  table: DialogueTableRow[];
}

export interface AppDependencies {
  config: AppConfig;
  dialogueBackend?: DialogueBackend;
  speechBackend?: SpeechBackend;
  retryDelayMs?: number;
}

const failure = (action: string, error: unknown): Outcome<never> => {
  const appError = AppError.fromUnknown(error);
  console.error(`[App] ${action} failed:`, error);
  return { ok: false, error: { code: appError.code, message: appError.message } };
};

export const createApp = ({ config, dialogueBackend, speechBackend, retryDelayMs }: AppDependencies) => {
  const resolveApiKey = (settings: RenderSettings) => settings.apiKey?.trim() || config.apiKey;
  const resolveApiBase = (settings: RenderSettings) => settings.apiBase?.trim() || config.apiBase;

  const buildVoiceConfig = (settings: RenderSettings): VoiceConfig => {
    const voiceFor = (speaker: Speaker): SpeakerVoice => {
      const override = settings.voices?.[speaker];
      const fallback = DEFAULT_SPEAKER_VOICES[speaker];
      return {
        voice: override?.voice || fallback.voice,
        instructions: override?.instructions ?? fallback.instructions,
      };
    };
    return {
      audioModel: settings.audioModel || config.audioModel,
      credentials: { apiKey: resolveApiKey(settings), apiBase: resolveApiBase(settings) },
      speakers: { 'speaker-1': voiceFor('speaker-1'), 'speaker-2': voiceFor('speaker-2') },
    };
  };

  const requireCredentials = (settings: RenderSettings) => {
    if (!resolveApiKey(settings) && !resolveApiBase(settings)) {
      throw new InputError('A Gemini API key is required. Set GEMINI_API_KEY or pass one explicitly.');
    }
  };

  const render = async (dialogue: Dialogue, settings: RenderSettings, session: DialogueSession): Promise<AudioOutput> => {
    session.state = 'SYNTHESIZING';
    try {
      const { audioPath, transcript, characterCount } = await renderDialogue(dialogue, buildVoiceConfig(settings), {
        outputDir: config.outputDir,
        concurrency: config.concurrency,
        backend: speechBackend,
      });
      return { audioPath, transcript, characterCount };
    } catch (error) {
      if (error instanceof AppError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new SynthesisError(`Audio synthesis failed: ${message}`, error);
    }
  };

  const generateAndRender = async (
    session: DialogueSession,
    sourceText: string,
    settings: GenerationSettings,
    priorTranscript?: string,
    userFeedback?: string
  ): Promise<GenerationOutput> => {
    requireCredentials(settings);
    const template = typeof settings.template === 'string' ? getTemplate(settings.template) : settings.template;
    const apiBase = resolveApiBase(settings);

    session.state = 'GENERATING';
    const dialogue = await generateDialogue(
      {
        sourceText,
        template,
        model: {
          model: settings.textModel || config.textModel,
          apiKey: resolveApiKey(settings),
          apiBase,
          reasoningEffort: settings.reasoningEffort,
        },
        priorTranscript,
        userFeedback,
      },
      { backend: dialogueBackend, maxAttempts: config.maxAttempts, baseDelayMs: retryDelayMs, debug: settings.debug }
    ).catch((error: unknown) => {
      throw AppError.fromUnknown(error, 'GENERATION_FAILED');
    });

    // Stored before rendering so a failed synthesis can be retried with rerender
    session.replace(dialogue, sourceText);
    const audio = await render(dialogue, settings, session);

    return { ...audio, sourceText, dialogue, table: dialogueToTable(dialogue) };
  };

  const run = async <T>(session: DialogueSession, action: string, task: () => Promise<T>): Promise<Outcome<T>> => {
    try {
      const value = await task();
      session.state = 'IDLE';
      return { ok: true, value };
    } catch (error) {
      session.state = 'ERROR';
      return failure(action, error);
    }
  };

  return {
    generate: (session: DialogueSession, sourceText: string, settings: GenerationSettings) =>
      run(session, 'Generation', async () => {
        if (!sourceText.trim()) {
          throw new InputError('Please provide at least one document (PDF, MD, MMD or TXT) before generating audio.');
        }
        return generateAndRender(session, sourceText, settings);
      }),

    regenerate: (session: DialogueSession, settings: GenerationSettings, input: RegenerateInput = {}) =>
      run(session, 'Regeneration', async () => {
        const previous = session.requireDialogue('regenerate');
        const priorTranscript =
          input.editedTranscript ?? (input.includeTranscript === false ? undefined : dialogueToPlainTranscript(previous));
        return generateAndRender(session, session.sourceText, settings, priorTranscript, input.userFeedback);
      }),

    rerender: (session: DialogueSession, settings: RenderSettings) =>
      run(session, 'Re-render', async () => {
        const dialogue = session.requireDialogue('re-render');
        requireCredentials(settings);
        return render(dialogue, settings, session);
      }),

    saveEdits: (session: DialogueSession, rows: readonly DialogueTableRow[]) =>
      run(session, 'Saving edits', async () => ({
        ...session.saveEdits(rows),
        message: 'Edits saved. Re-render to hear them.',
      })),

    exportMarkdown: (session: DialogueSession) =>
      run(session, 'Markdown export', () => saveDialogueMarkdown(session.requireDialogue('save'), config.outputDir)),
  };
};
