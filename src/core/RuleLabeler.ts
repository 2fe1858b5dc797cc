/**
 * Deterministic paragraph labeling from text patterns
 */
import { Paragraph, ParagraphLabel, textLength } from '../models/Paragraph';

// Common heading and marker patterns
const CHAPTER_PATTERN = /^\s*第[一二三四五六七八九十百千0-9]+章/;
const SECTION_PATTERN = /^\s*第[一二三四五六七八九十百千0-9]+节/;
const ENGLISH_CHAPTER_PATTERN = /^\s*chapter\s+\d+\b/i;
const CN_ENUM_PATTERN = /^\s*[一二三四五六七八九十]+、/;
const NUMBERED_HEADING_PATTERN = /^\s*(\d+(?:\.\d+){0,3})\s+/; // 1 / 1.1 / 1.1.1
const CAPTION_PATTERN = /^\s*(?:[图表]\s*\d+|(?:figure|fig\.|table)\s+\d+)/i;
const LIST_PATTERN = /^\s*(?:[•·●▪◦\-*–]\s+|[(（]\d+[)）]|\d+[)）])/;
const HAS_LETTER_PATTERN = /\p{L}/u;
const ENUMERATION_ENDING_PATTERN = /[;；,，、]$/;

export interface RuleLabel {
  label: ParagraphLabel;
  confidence: number;
}

export interface RuleLabelerOptions {
  shortBodyMaxChars?: number;
}

/**
 * Label one paragraph. A short body line ending like an enumeration entry
 * (`;` `,` `、` and their full-width forms) may be an unmarked list item and
 * gets a lower confidence than other body text.
 */
export function detectRole(text: string, shortBodyMaxChars: number = 60): RuleLabel {
  const trimmed = text.trim();

  if (trimmed === '') {
    return { label: 'blank', confidence: 1.0 };
  }
  if (CHAPTER_PATTERN.test(trimmed) || ENGLISH_CHAPTER_PATTERN.test(trimmed)) {
    return { label: 'h1', confidence: 0.95 };
  }
  if (SECTION_PATTERN.test(trimmed)) {
    return { label: 'h2', confidence: 0.9 };
  }
  if (CAPTION_PATTERN.test(trimmed)) {
    return { label: 'caption', confidence: 0.85 };
  }

  const numbered = trimmed.match(NUMBERED_HEADING_PATTERN);
  if (numbered) {
    const depth = numbered[1].split('.').length - 1;
    return { label: depth === 0 ? 'h2' : 'h3', confidence: 0.75 };
  }

  if (CN_ENUM_PATTERN.test(trimmed)) {
    return { label: 'h2', confidence: 0.8 };
  }
  if (LIST_PATTERN.test(trimmed)) {
    return { label: 'list_item', confidence: 0.8 };
  }
  if (!HAS_LETTER_PATTERN.test(trimmed)) {
    return { label: 'unknown', confidence: 0.3 };
  }

  if (textLength(trimmed) > shortBodyMaxChars) {
    return { label: 'body', confidence: 0.85 };
  }
  return ENUMERATION_ENDING_PATTERN.test(trimmed)
    ? { label: 'body', confidence: 0.6 }
    : { label: 'body', confidence: 0.8 };
}

/**
 * Label every paragraph of a document, indexed from 0 in document order
 */
export function labelParagraphs(texts: readonly string[], options: RuleLabelerOptions = {}): Paragraph[] {
  return texts.map((text, index) => ({
    index,
    text,
    ...detectRole(text, options.shortBodyMaxChars),
  }));
}
