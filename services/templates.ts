import { z } from 'zod';
import presets from '../templates/presets.json';
import type { TemplateFields } from '../types';
import { InputError } from './errors';

const TemplateFieldsSchema = z.object({
  intro: z.string(),
  textAnalysis: z.string(),
  scratchpad: z.string(),
  prelude: z.string(),
  dialogueInstructions: z.string(),
});

// Parsed once at load; a malformed presets file fails fast
const TEMPLATES: ReadonlyMap<string, Readonly<TemplateFields>> = new Map(
  Object.entries(z.record(TemplateFieldsSchema).parse(presets)).map(([name, fields]) => [name, Object.freeze(fields)])
);

export const listTemplates = (): string[] => [...TEMPLATES.keys()];

export const getTemplate = (name: string): TemplateFields => {
  const template = TEMPLATES.get(name);
  if (!template) {
    throw new InputError(`Unknown template "${name}". Available: ${listTemplates().join(', ')}`);
  }
  return { ...template };
};
