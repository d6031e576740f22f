#!/usr/bin/env -S npx tsx
import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parseArgs } from 'node:util';
import { createApp } from './app';
import type { GenerationSettings } from './app';
import { loadConfig } from './config';
import { DEFAULT_TEMPLATE, VOICE_OPTIONS } from './constants';
import { DialogueSession } from './services/dialogueSession';
import { InputError } from './services/errors';
import { listTemplates } from './services/templates';
import type { ReasoningEffort } from './types';

const TEXT_EXTENSIONS = ['.txt', '.md', '.mmd'];
const REASONING_EFFORTS: readonly ReasoningEffort[] = ['none', 'low', 'medium', 'high'];

const USAGE = `Usage: docucast generate <files...> [options]

Options:
  --template <name>      Instruction preset (${listTemplates().join(', ')})
  --text-model <id>      Text generation model
  --reasoning <effort>   none | low | medium | high
  --audio-model <id>     Speech model
  --voice1 <voice>       Voice for speaker-1
  --voice2 <voice>       Voice for speaker-2
  --style1 <text>        Delivery instructions for speaker-1
  --style2 <text>        Delivery instructions for speaker-2
  --api-base <url>       Custom API endpoint
  --feedback <text>      Regenerate once more with this feedback
  --markdown             Also save the dialogue as Markdown
  --debug                Log the improvement prompt`;

const readSources = async (files: string[]): Promise<string> => {
  let combined = '';
  for (const file of files) {
    if (!TEXT_EXTENSIONS.includes(extname(file).toLowerCase())) {
      throw new InputError(`Unsupported file "${file}". Extract PDFs to text first; accepted: ${TEXT_EXTENSIONS.join(', ')}`);
    }
    combined += `${await readFile(file, 'utf-8')}\n\n`;
  }
  return combined;
};

const parseVoice = (value: string | undefined): string | undefined => {
  if (value === undefined) return undefined;
  if (!VOICE_OPTIONS.some(option => option.id === value)) {
    throw new InputError(`Unknown voice "${value}". Available: ${VOICE_OPTIONS.map(option => option.id).join(', ')}`);
  }
  return value;
};

const parseReasoning = (value: string | undefined): ReasoningEffort | undefined => {
  if (value === undefined) return undefined;
  const effort = REASONING_EFFORTS.find(candidate => candidate === value);
  if (!effort) throw new InputError(`Unknown reasoning effort "${value}"`);
  return effort;
};

const main = async (): Promise<number> => {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      template: { type: 'string', default: DEFAULT_TEMPLATE },
      'text-model': { type: 'string' },
      reasoning: { type: 'string' },
      'audio-model': { type: 'string' },
      voice1: { type: 'string' },
      voice2: { type: 'string' },
      style1: { type: 'string' },
      style2: { type: 'string' },
      'api-base': { type: 'string' },
      feedback: { type: 'string' },
      markdown: { type: 'boolean', default: false },
      debug: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });

  const [command, ...files] = positionals;
  if (values.help || command !== 'generate' || files.length === 0) {
    console.log(USAGE);
    return values.help ? 0 : 1;
  }

  const settings: GenerationSettings = {
    template: values.template ?? DEFAULT_TEMPLATE,
    textModel: values['text-model'],
    reasoningEffort: parseReasoning(values.reasoning),
    audioModel: values['audio-model'],
    apiBase: values['api-base'],
    voices: {
      'speaker-1': { voice: parseVoice(values.voice1), instructions: values.style1 },
      'speaker-2': { voice: parseVoice(values.voice2), instructions: values.style2 },
    },
    debug: values.debug,
  };

  const app = createApp({ config: loadConfig() });
  const session = new DialogueSession();

  let outcome = await app.generate(session, await readSources(files), settings);
  if (outcome.ok && values.feedback) {
    outcome = await app.regenerate(session, settings, { userFeedback: values.feedback });
  }
  if (!outcome.ok) {
    console.error(`Error: ${outcome.error.message}`);
    return 1;
  }

  console.log(outcome.value.transcript);
  console.log(`Audio: ${outcome.value.audioPath}`);

  if (values.markdown) {
    const saved = await app.exportMarkdown(session);
    if (!saved.ok) {
      console.error(`Error: ${saved.error.message}`);
      return 1;
    }
    console.log(`Markdown: ${saved.value}`);
  }

  return 0;
};

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  }
);
