import { randomBytes } from 'node:crypto';
import { mkdir, readdir, stat, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  ARTIFACT_MAX_AGE_MS,
  ARTIFACT_PREFIX,
  PCM_BITS_PER_SAMPLE,
  PCM_CHANNELS,
  PCM_SAMPLE_RATE,
} from '../constants';

export const decodeBase64 = (base64: string): Buffer => Buffer.from(base64, 'base64');

// Wrap raw PCM in a RIFF/WAVE container so the artifact is playable as-is
export const createWavBuffer = (
  pcm: Uint8Array,
  sampleRate: number = PCM_SAMPLE_RATE,
  numChannels: number = PCM_CHANNELS,
  bitsPerSample: number = PCM_BITS_PER_SAMPLE
): Buffer => {
  const blockAlign = numChannels * (bitsPerSample / 8);
  const header = Buffer.alloc(44);

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write('WAVE', 8, 'ascii');

  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16); // fmt chunk length
  header.writeUInt16LE(1, 20); // PCM (uncompressed)
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);

  header.write('data', 36, 'ascii');
  header.writeUInt32LE(pcm.length, 40);

  return Buffer.concat([header, pcm]);
};

export const createArtifactName = (now: number = Date.now()): string =>
  `${ARTIFACT_PREFIX}${now}_${randomBytes(4).toString('hex')}.wav`;

export const writeAudioArtifact = async (pcm: Uint8Array, directory: string): Promise<string> => {
  await mkdir(directory, { recursive: true });
  const filePath = join(directory, createArtifactName());
  await writeFile(filePath, createWavBuffer(pcm));
  return filePath;
};

// Another session sweeping the same directory may have removed the file first
const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Deletes this app's `.wav` artifacts in `directory` older than `maxAgeMs`.
 * Other files are left alone. Returns the paths that were removed.
 */
export const sweepStaleArtifacts = async (
  directory: string,
  now: number = Date.now(),
  maxAgeMs: number = ARTIFACT_MAX_AGE_MS
): Promise<string[]> => {
  const entries = await readdir(directory, { withFileTypes: true });
  const removed: string[] = [];

  for (const entry of entries) {
    if (!entry.isFile() || !entry.name.startsWith(ARTIFACT_PREFIX) || !entry.name.endsWith('.wav')) continue;
    const filePath = join(directory, entry.name);
    try {
      const { mtimeMs } = await stat(filePath);
      if (now - mtimeMs <= maxAgeMs) continue;
      await unlink(filePath);
      removed.push(filePath);
    } catch (error) {
      if (!isMissingFile(error)) throw error;
    }
  }

  return removed;
};
