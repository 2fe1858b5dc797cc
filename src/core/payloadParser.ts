/**
 * Turns the model's reply into a ClassificationResult.
 *
 * The reply is checked field by field: entries without a usable index are
 * dropped, unrecognised enum values fall back to defaults and confidences are
 * clamped to [0, 1].
 */
import {
  APPLY_MODES,
  ClassificationOperation,
  ClassificationResult,
  RemoteParagraphLabel,
  Suggestion,
  SUGGESTION_CATEGORIES,
  SUGGESTION_SEVERITIES,
} from '../models/Classification';
import type { ParagraphLabel } from '../models/Paragraph';
import type { ParagraphType } from '../prompts/promptItems';
import { PayloadParseError } from '../utils/errors';

const TYPE_TO_LABEL: Record<ParagraphType, ParagraphLabel> = {
  title_1: 'h1',
  title_2: 'h2',
  title_3: 'h3',
  body: 'body',
  list_item: 'list_item',
  table_caption: 'caption',
  figure_caption: 'caption',
  abstract: 'body',
  keyword: 'body',
  reference: 'body',
  footer: 'body',
  unknown: 'unknown',
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pick<T extends string>(allowed: readonly T[], value: unknown, fallback: T): T {
  const normalized = typeof value === 'string' ? value.trim().toLowerCase() : value;
  return allowed.find(candidate => candidate === normalized) ?? fallback;
}

function stringField(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function indexField(value: unknown): number | undefined {
  const index = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof index === 'number' && Number.isInteger(index) && index >= 0 ? index : undefined;
}

/**
 * Strip a markdown code fence around the JSON, if the model added one
 */
export function normalizeJsonText(raw: string): string {
  const text = raw.trim();
  const fenced = text.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenced ? fenced[1].trim() : text;
}

/**
 * Accepts 0.85, "0.85" or "85%". Anything unreadable becomes 0.
 */
export function parseConfidence(value: unknown): number {
  let confidence: number;
  if (typeof value === 'number') {
    confidence = value;
  } else if (typeof value === 'string') {
    const text = value.trim();
    confidence = text.endsWith('%') ? Number(text.slice(0, -1)) / 100 : Number(text);
  } else {
    return 0;
  }
  if (!Number.isFinite(confidence)) {
    return 0;
  }
  return Math.min(1, Math.max(0, confidence));
}

export function toParagraphLabel(paragraphType: unknown): ParagraphLabel {
  const type = typeof paragraphType === 'string' ? paragraphType.trim().toLowerCase() : '';
  const known = Object.entries(TYPE_TO_LABEL).find(([name]) => name === type);
  return known ? known[1] : 'unknown';
}

export function canonicalizeParagraph(raw: unknown): RemoteParagraphLabel | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const index = indexField(raw.index ?? raw.paragraph_index);
  if (index === undefined) {
    return undefined;
  }
  return {
    index,
    label: toParagraphLabel(raw.paragraph_type ?? raw.type),
    confidence: parseConfidence(raw.confidence),
    rationale: stringField(raw.reasoning ?? raw.rationale),
  };
}

export function canonicalizeSuggestion(raw: unknown): Suggestion | undefined {
  if (!isRecord(raw)) {
    return undefined;
  }
  const suggestion: Suggestion = {
    category: pick(SUGGESTION_CATEGORIES, raw.category, 'ambiguity'),
    severity: pick(SUGGESTION_SEVERITIES, raw.severity, 'low'),
    confidence: parseConfidence(raw.confidence),
    evidence: stringField(raw.evidence),
    recommendedAction: stringField(raw.suggestion ?? raw.recommended_action),
    rationale: stringField(raw.rationale),
    applyMode: pick(APPLY_MODES, raw.apply_mode, 'manual'),
  };
  const paragraphIndex = indexField(raw.paragraph_index ?? raw.index);
  if (paragraphIndex !== undefined) {
    suggestion.paragraphIndex = paragraphIndex;
  }
  return suggestion;
}

function listField(payload: Record<string, unknown>, key: string): unknown[] {
  const value = payload[key];
  return Array.isArray(value) ? value : [];
}

/**
 * Parse the message content of a chat completion.
 * Throws PayloadParseError when the content is not a JSON object.
 */
export function parseClassificationContent(
  content: string,
  operation: ClassificationOperation
): ClassificationResult {
  let payload: unknown;
  try {
    payload = JSON.parse(normalizeJsonText(content));
  } catch (error) {
    throw new PayloadParseError(
      `model reply is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      content
    );
  }
  if (!isRecord(payload)) {
    throw new PayloadParseError('model reply is not a JSON object', content);
  }

  const paragraphs = listField(payload, 'paragraphs')
    .map(canonicalizeParagraph)
    .filter((entry): entry is RemoteParagraphLabel => entry !== undefined);

  if (operation === 'structure') {
    return { operation, paragraphs };
  }

  const suggestions = listField(payload, 'suggestions')
    .map(canonicalizeSuggestion)
    .filter((entry): entry is Suggestion => entry !== undefined);

  return { operation, paragraphs, suggestions };
}
