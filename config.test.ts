import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({
      apiKey: undefined,
      apiBase: undefined,
      textModel: 'gemini-2.5-flash',
      audioModel: 'gemini-2.5-flash-preview-tts',
      outputDir: join(tmpdir(), 'docucast'),
      concurrency: 8,
      maxAttempts: 3,
    });
  });

  it('prefers GEMINI_API_KEY over API_KEY', () => {
    expect(loadConfig({ GEMINI_API_KEY: 'test-key', API_KEY: 'other-key' }).apiKey).toBe('test-key');
    expect(loadConfig({ GEMINI_API_KEY: '  ', API_KEY: 'other-key' }).apiKey).toBe('other-key');
  });

  it('reads overrides and coerces numbers', () => {
    const config = loadConfig({
      DOCUCAST_API_BASE: 'http://localhost:8080',
      DOCUCAST_TEXT_MODEL: 'gemini-2.5-pro',
      DOCUCAST_OUTPUT_DIR: '/tmp/casts',
      DOCUCAST_CONCURRENCY: '4',
      DOCUCAST_MAX_ATTEMPTS: '5',
    });

    expect(config).toMatchObject({
      apiBase: 'http://localhost:8080',
      textModel: 'gemini-2.5-pro',
      outputDir: '/tmp/casts',
      concurrency: 4,
      maxAttempts: 5,
    });
  });

  it('rejects invalid numbers', () => {
    expect(() => loadConfig({ DOCUCAST_CONCURRENCY: '0' })).toThrow();
    expect(() => loadConfig({ DOCUCAST_MAX_ATTEMPTS: 'many' })).toThrow();
  });
});
