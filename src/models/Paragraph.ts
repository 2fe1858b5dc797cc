/**
 * Models for paragraphs and their structural labels
 */

export const PARAGRAPH_LABELS = [
  'h1',
  'h2',
  'h3',
  'body',
  'list_item',
  'caption',
  'blank',
  'unknown',
] as const;

export type ParagraphLabel = (typeof PARAGRAPH_LABELS)[number];

export type LabelSource = 'rule' | 'remote';

export const LABELING_MODES = ['rule', 'remote', 'hybrid'] as const;

export type LabelingMode = (typeof LABELING_MODES)[number];

// A paragraph as produced by the rule labeler; never mutated afterwards
export interface Paragraph {
  readonly index: number;       // Position in the document, starting at 0
  readonly text: string;        // Raw paragraph text
  readonly label: ParagraphLabel; // Deterministic label
  readonly confidence: number;  // Deterministic confidence (0-1)
}

/**
 * Length of a paragraph's trimmed text in code points, so CJK text and
 * astral characters count one per character.
 */
export function textLength(text: string): number {
  return Array.from(text.trim()).length;
}
