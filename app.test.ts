import { mkdtemp, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from './app';
import type { GenerationSettings, Outcome } from './app';
import type { AppConfig } from './config';
import { DialogueSession } from './services/dialogueSession';
import type { SpeechRequest, TextModelOptions } from './types';

const dialogueJson = JSON.stringify({
  scratchpad: 'outline',
  dialogue: [
    { speaker: 'speaker-1', text: 'Welcome back.' },
    { speaker: 'speaker-2', text: 'Glad to be here.' },
  ],
});

const settings: GenerationSettings = { template: 'podcast' };

const unwrap = <T>(outcome: Outcome<T>): T => {
  if (!outcome.ok) throw new Error(`${outcome.error.code}: ${outcome.error.message}`);
  return outcome.value;
};

let config: AppConfig;
const dialogueBackend = vi.fn(async (_prompt: string, _options: TextModelOptions): Promise<string | undefined> => dialogueJson);
const speechBackend = vi.fn(async (request: SpeechRequest): Promise<Uint8Array> => Buffer.from(request.voice === 'Kore' ? 'A' : 'B'));

const makeApp = () => createApp({ config, dialogueBackend, speechBackend, retryDelayMs: 0 });

beforeEach(async () => {
  config = {
    apiKey: 'test-key',
    textModel: 'gemini-2.5-flash',
    audioModel: 'gemini-2.5-flash-preview-tts',
    outputDir: await mkdtemp(join(tmpdir(), 'docucast-app-')),
    concurrency: 2,
    maxAttempts: 3,
  };
  dialogueBackend.mockReset();
  dialogueBackend.mockResolvedValue(dialogueJson);
  speechBackend.mockClear();
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

describe('generate', () => {
  it('produces a dialogue, transcript and WAV file', async () => {
    const session = new DialogueSession();

    const output = unwrap(await makeApp().generate(session, 'Octopuses have three hearts.', settings));

    expect(output.transcript).toBe('speaker-1: Welcome back.\n\nspeaker-2: Glad to be here.\n\n');
    expect(output.characterCount).toBe(29);
    expect(output.table).toEqual([
      { Speaker: 'speaker-1', Line: 'Welcome back.' },
      { Speaker: 'speaker-2', Line: 'Glad to be here.' },
    ]);
    const wav = await readFile(output.audioPath);
    expect(wav.subarray(0, 4).toString()).toBe('RIFF');
    expect(wav.subarray(44).toString()).toBe('AB');
    expect(session.sourceText).toBe('Octopuses have three hearts.');
    expect(session.state).toBe('IDLE');
  });

  it('uses the default voices and style notes', async () => {
    await makeApp().generate(new DialogueSession(), 'Source', settings);

    expect(speechBackend.mock.calls.map(([request]) => [request.voice, request.styleInstructions])).toEqual([
      ['Kore', 'Speak in an emotive and friendly tone.'],
      ['Puck', 'Speak in a friendly, but serious tone.'],
    ]);
  });

  it('rejects a blank source', async () => {
    const outcome = await makeApp().generate(new DialogueSession(), '  \n', settings);

    expect(outcome).toEqual({
      ok: false,
      error: {
        code: 'INPUT',
        message: 'Please provide at least one document (PDF, MD, MMD or TXT) before generating audio.',
      },
    });
    expect(dialogueBackend).not.toHaveBeenCalled();
  });

  it('requires an API key or endpoint', async () => {
    config = { ...config, apiKey: undefined };

    const outcome = await makeApp().generate(new DialogueSession(), 'Source', settings);

    expect(outcome).toEqual({
      ok: false,
      error: { code: 'INPUT', message: 'A Gemini API key is required. Set GEMINI_API_KEY or pass one explicitly.' },
    });
  });

  it('reports a model that never returns a valid dialogue', async () => {
    dialogueBackend.mockResolvedValue('not json');
    const session = new DialogueSession();

    const outcome = await makeApp().generate(session, 'Source', settings);

    expect(outcome).toEqual({
      ok: false,
      error: { code: 'GENERATION_FAILED', message: 'The text model did not return a valid dialogue after 3 attempts.' },
    });
    expect(dialogueBackend).toHaveBeenCalledTimes(3);
    expect(session.current).toBeNull();
  });

  it('keeps the dialogue when synthesis fails', async () => {
    speechBackend.mockRejectedValueOnce(new Error('quota exceeded'));
    const session = new DialogueSession();

    const outcome = await makeApp().generate(session, 'Source', settings);

    expect(outcome).toEqual({
      ok: false,
      error: { code: 'SYNTHESIS_FAILED', message: 'Audio synthesis failed: quota exceeded' },
    });
    expect(session.state).toBe('ERROR');
    expect(session.current?.lines).toHaveLength(2);
  });
});

describe('session actions', () => {
  it('refuse to run before a dialogue exists', async () => {
    const app = makeApp();
    const session = new DialogueSession();

    const outcomes = [
      await app.regenerate(session, settings),
      await app.rerender(session, settings),
      await app.saveEdits(session, [{ Speaker: 'speaker-1', Line: 'Hi' }]),
      await app.exportMarkdown(session),
    ];

    expect(outcomes.map(outcome => (outcome.ok ? 'ok' : outcome.error.code))).toEqual([
      'NOTHING_TO_EDIT',
      'NOTHING_TO_EDIT',
      'NOTHING_TO_EDIT',
      'NOTHING_TO_EDIT',
    ]);
    expect(outcomes[1]).toEqual({
      ok: false,
      error: { code: 'NOTHING_TO_EDIT', message: 'Nothing to re-render yet. Generate a dialogue first.' },
    });
  });

  it('re-renders saved edits without calling the text model again', async () => {
    const app = makeApp();
    const session = new DialogueSession();
    unwrap(await app.generate(session, 'Source', settings));

    const saved = unwrap(await app.saveEdits(session, [{ Speaker: 'speaker-2', Line: 'Edited line' }]));
    const audio = unwrap(await app.rerender(session, settings));

    expect(saved.message).toBe('Edits saved. Re-render to hear them.');
    expect(audio.transcript).toBe('speaker-2: Edited line\n\n');
    expect((await readFile(audio.audioPath)).subarray(44).toString()).toBe('B');
    expect(dialogueBackend).toHaveBeenCalledTimes(1);
  });

  it('applies voice overrides on re-render', async () => {
    const app = makeApp();
    const session = new DialogueSession();
    unwrap(await app.generate(session, 'Source', settings));
    speechBackend.mockClear();

    unwrap(await app.rerender(session, { voices: { 'speaker-2': { voice: 'Charon', instructions: '' } } }));

    expect(speechBackend.mock.calls.map(([request]) => [request.voice, request.styleInstructions])).toEqual([
      ['Kore', 'Speak in an emotive and friendly tone.'],
      ['Charon', ''],
    ]);
  });

  it('regenerates from the stored source with the prior transcript and feedback', async () => {
    const app = makeApp();
    const session = new DialogueSession();
    unwrap(await app.generate(session, 'Honeybees dance to share directions.', settings));

    unwrap(await app.regenerate(session, settings, { userFeedback: 'Shorter please' }));

    const [prompt] = dialogueBackend.mock.calls[1];
    expect(prompt).toContain('<input_text>\nHoneybees dance to share directions.\n</input_text>');
    expect(prompt).toContain(
      '<edited_transcript>\nspeaker-1: Welcome back.\nspeaker-2: Glad to be here.\n</edited_transcript>'
    );
    expect(prompt).toContain('Overall user feedback:\n\nShorter please');
  });

  it('can regenerate from feedback alone', async () => {
    const app = makeApp();
    const session = new DialogueSession();
    unwrap(await app.generate(session, 'Source', settings));

    unwrap(await app.regenerate(session, settings, { userFeedback: 'Add a joke', includeTranscript: false }));

    const [prompt] = dialogueBackend.mock.calls[1];
    expect(prompt).not.toContain('<edited_transcript>');
    expect(prompt).toContain('Overall user feedback:\n\nAdd a joke');
  });

  it('exports the dialogue as Markdown', async () => {
    const app = makeApp();
    const session = new DialogueSession();
    unwrap(await app.generate(session, 'Source', settings));

    const filePath = unwrap(await app.exportMarkdown(session));

    expect(await readFile(filePath, 'utf-8')).toBe(
      '# Docucast Transcript\n\n## Transcript\n\n**speaker-1:** Welcome back.\n\n**speaker-2:** Glad to be here.\n'
    );
  });
});
