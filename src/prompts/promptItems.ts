import type { ClassificationRequest } from '../models/Classification';
import type { ParagraphLabel } from '../models/Paragraph';

// Values the model may answer with in `paragraph_type`
export const PARAGRAPH_TYPES = [
  'title_1',
  'title_2',
  'title_3',
  'body',
  'list_item',
  'table_caption',
  'figure_caption',
  'abstract',
  'keyword',
  'reference',
  'footer',
  'unknown',
] as const;

export type ParagraphType = (typeof PARAGRAPH_TYPES)[number];

export const PREVIEW_MAX_CHARS = 200;

export interface PromptItem {
  index: number;
  text_preview: string;
  rule_label?: ParagraphLabel;
}

/**
 * Paragraphs as sent to the model. Text is cut to PREVIEW_MAX_CHARS code
 * points to bound the request size.
 */
export function toPromptItems(request: ClassificationRequest): PromptItem[] {
  return request.paragraphs.map(paragraph => {
    const item: PromptItem = {
      index: paragraph.index,
      text_preview: Array.from(paragraph.text).slice(0, PREVIEW_MAX_CHARS).join(''),
    };
    const ruleLabel = request.knownLabels?.get(paragraph.index);
    if (ruleLabel !== undefined) {
      item.rule_label = ruleLabel;
    }
    return item;
  });
}
