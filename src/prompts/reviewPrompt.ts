// src/prompts/reviewPrompt.ts - Prompt for reviewing paragraphs the rules were unsure about
import type { ClassificationRequest } from '../models/Classification';
import { SUGGESTION_CATEGORIES, SUGGESTION_SEVERITIES } from '../models/Classification';
import { PARAGRAPH_TYPES, toPromptItems } from './promptItems';

/**
 * System prompt for reviewing a subset of paragraphs that carry rule labels
 */
export const reviewSystemPrompt =
  'You review the structural labels of selected paragraphs from a Word document.\n' +
  'Each paragraph may carry "rule_label", the label assigned by deterministic rules. ' +
  'Confirm or correct it, and report structural problems you notice.\n' +
  'Return ONLY valid JSON, with no explanation outside it, in the form:\n' +
  '{"paragraphs": [{"index": number, "paragraph_type": string, "confidence": number, "reasoning": string}], ' +
  '"suggestions": [{"paragraph_index": number, "category": string, "severity": string, "confidence": number, ' +
  '"evidence": string, "suggestion": string, "rationale": string, "apply_mode": "manual" | "auto"}]}\n' +
  `paragraph_type must be one of: ${PARAGRAPH_TYPES.join(', ')}.\n` +
  `category must be one of: ${SUGGESTION_CATEGORIES.join(', ')}. ` +
  `severity must be one of: ${SUGGESTION_SEVERITIES.join(', ')}.\n` +
  'confidence is a number between 0.0 and 1.0. Return an empty "suggestions" array when there is nothing to report.';

export function buildReviewUserPrompt(request: ClassificationRequest): string {
  const items = toPromptItems(request);
  return (
    `Review the following ${items.length} paragraphs.\n\n` +
    `Paragraphs (JSON):\n${JSON.stringify(items, null, 2)}\n\n` +
    'Answer in the JSON format given in the system prompt.'
  );
}
