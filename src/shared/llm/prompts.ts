/**
 * LLM Prompts
 *
 * Prompt assembly helpers shared by every generator call site.
 */

/**
 * A labelled block of prompt content ("JOB DESCRIPTION:", "CURRENT DESCRIPTION:")
 */
export interface PromptSection {
  label: string;
  content: string;
}

/**
 * Build a structured prompt: task line, labelled content blocks,
 * numbered instructions and an optional output format
 */
export function buildStructuredPrompt(
  task: string,
  sections: PromptSection[],
  instructions: string[],
  outputFormat?: string
): string {
  let prompt = `${task}\n\n`;

  for (const section of sections) {
    prompt += `${section.label.toUpperCase()}:\n${escapePromptText(section.content)}\n\n`;
  }

  if (instructions.length > 0) {
    prompt += 'INSTRUCTIONS:\n';
    instructions.forEach((instruction, i) => {
      prompt += `${i + 1}. ${instruction}\n`;
    });
    prompt += '\n';
  }

  if (outputFormat) {
    prompt += `OUTPUT FORMAT:\n${outputFormat}\n`;
  }

  return prompt.trimEnd();
}

/**
 * Normalize line endings and trim text for inclusion in prompts
 */
export function escapePromptText(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .trim();
}
