import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { ARTIFACT_PREFIX, TRANSCRIPT_TITLE } from '../constants';
import { SPEAKERS } from '../types';
import type { AppState, Dialogue, DialogueTableRow } from '../types';
import { formatTranscriptLine } from './audioAssembler';
import { InputError, NothingToEditError } from './errors';

const TableRowSchema = z.object({
  Speaker: z.string().trim().pipe(z.enum(SPEAKERS)),
  Line: z.string(),
});

export const dialogueToTable = (dialogue: Dialogue): DialogueTableRow[] =>
  dialogue.lines.map(line => ({ Speaker: line.speaker, Line: line.text }));

/**
 * Rebuilds a dialogue from editor rows. The scratchpad is not part of the
 * table, so the result always carries an empty one.
 */
export const tableToDialogue = (rows: readonly DialogueTableRow[], scratchpad = ''): Dialogue => {
  if (rows.length === 0) throw new InputError('The edited dialogue has no lines.');

  const lines = rows.map((row, index) => {
    const parsed = TableRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new InputError(`Row ${index + 1}: speaker must be one of ${SPEAKERS.join(', ')}.`);
    }
    return { speaker: parsed.data.Speaker, text: parsed.data.Line };
  });

  return { scratchpad, lines };
};

export const dialogueToPlainTranscript = (dialogue: Dialogue): string =>
  dialogue.lines.map(formatTranscriptLine).join('\n');

export const dialogueToMarkdown = (dialogue: Dialogue): string => {
  const parts = [`# ${TRANSCRIPT_TITLE}\n`, '## Transcript\n'];
  for (const line of dialogue.lines) {
    parts.push(`**${line.speaker}:** ${line.text.trim()}\n`);
  }
  return parts.join('\n');
};

export const saveDialogueMarkdown = async (dialogue: Dialogue, directory: string, now: number = Date.now()): Promise<string> => {
  await mkdir(directory, { recursive: true });
  const filePath = join(directory, `${ARTIFACT_PREFIX}dialogue_${Math.floor(now / 1000)}.md`);
  await writeFile(filePath, dialogueToMarkdown(dialogue), 'utf-8');
  return filePath;
};

/**
 * Per-user state between requests: the latest dialogue and the source text
 * it was generated from. One instance per session; never shared.
 */
export class DialogueSession {
  private dialogue: Dialogue | null = null;
  private source = '';
  state: AppState = 'IDLE';

  get current(): Dialogue | null {
    return this.dialogue;
  }

  get sourceText(): string {
    return this.source;
  }

  replace(dialogue: Dialogue, sourceText?: string): void {
    this.dialogue = dialogue;
    if (sourceText !== undefined) this.source = sourceText;
  }

  clear(): void {
    this.dialogue = null;
    this.source = '';
    this.state = 'IDLE';
  }

  requireDialogue(action: string): Dialogue {
    if (!this.dialogue) throw new NothingToEditError(action);
    return this.dialogue;
  }

  exportTable(): DialogueTableRow[] {
    return dialogueToTable(this.requireDialogue('export'));
  }

  saveEdits(rows: readonly DialogueTableRow[]): { dialogue: Dialogue; transcript: string } {
    this.requireDialogue('edit');
    const dialogue = tableToDialogue(rows);
    this.dialogue = dialogue;
    console.log(`[Session] Saved ${dialogue.lines.length} edited lines`);
    return { dialogue, transcript: dialogueToPlainTranscript(dialogue) };
  }
}
