// src/prompts/structurePrompt.ts - Prompt for labeling the structure of a whole document
import type { ClassificationRequest } from '../models/Classification';
import { PARAGRAPH_TYPES, toPromptItems } from './promptItems';

/**
 * System prompt for structure classification of every paragraph
 */
export const structureSystemPrompt =
  'You are an expert in the structure of academic and official Chinese and English documents.\n' +
  'You receive the paragraphs of a Word document and label each one with its structural type.\n' +
  'Return ONLY valid JSON, with no explanation outside it, in the form:\n' +
  '{"doc_language": string, "total_paragraphs": number, "paragraphs": [' +
  '{"index": number, "text_preview": string, "paragraph_type": string, "confidence": number, "reasoning": string}]}\n' +
  `paragraph_type must be one of: ${PARAGRAPH_TYPES.join(', ')}.\n` +
  'confidence is a number between 0.0 and 1.0.';

export function buildStructureUserPrompt(request: ClassificationRequest): string {
  const items = toPromptItems(request);
  return (
    `Label the following ${items.length} paragraphs.\n\n` +
    `Paragraphs (JSON):\n${JSON.stringify(items, null, 2)}\n\n` +
    'Answer in the JSON format given in the system prompt.'
  );
}
