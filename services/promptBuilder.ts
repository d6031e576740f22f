import type { TemplateFields } from '../types';

export const IMPROVEMENT_INSTRUCTION =
  'Based on the original text, please generate an improved version of the dialogue by incorporating the edits, comments and feedback.';

/**
 * Builds the block that asks the model to revise an earlier dialogue.
 * Returns an empty string when neither a transcript nor feedback is given.
 */
export const buildImprovementsBlock = (priorTranscript?: string, userFeedback?: string): string => {
  const transcript = priorTranscript?.trim() ?? '';
  const feedback = userFeedback?.trim() ?? '';
  if (!transcript && !feedback) return '';

  const parts: string[] = [];
  if (transcript) {
    parts.push(
      'Previously generated transcript, with specific edits and comments that I want you to carefully address:',
      `<edited_transcript>\n${transcript}\n</edited_transcript>`
    );
  }
  if (feedback) {
    parts.push(`Overall user feedback:\n\n${feedback}`);
  }
  parts.push(IMPROVEMENT_INSTRUCTION);

  return `<requested_improvements>\n${parts.join('\n\n')}\n</requested_improvements>`;
};

export const buildDialoguePrompt = (
  sourceText: string,
  template: TemplateFields,
  priorTranscript?: string,
  userFeedback?: string
): string => {
  const sections = [
    template.intro,
    `Here is the original input text:\n\n<input_text>\n${sourceText}\n</input_text>`,
    template.textAnalysis,
    `<scratchpad>\n${template.scratchpad}\n</scratchpad>`,
    template.prelude,
    `<podcast_dialogue>\n${template.dialogueInstructions}\n</podcast_dialogue>`,
  ];

  const improvements = buildImprovementsBlock(priorTranscript, userFeedback);
  if (improvements) sections.push(improvements);

  return sections.map(section => section.trim()).join('\n\n');
};
