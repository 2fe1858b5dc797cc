/**
 * Decides which paragraphs, if any, need a remote review in hybrid mode.
 *
 * Three independent conditions are checked over the rule labels:
 * - unknown: any paragraph the rules could not label
 * - ambiguous heading: an h2/h3 whose text is longer than `headingMaxChars`
 * - potential list: `shortBodyMinRun` or more consecutive short,
 *   low-confidence body paragraphs
 */
import type { HybridSettings } from '../config';
import type { TriggerReport } from '../models/Classification';
import { Paragraph, textLength } from '../models/Paragraph';

export interface TriggerCondition {
  fired: boolean;
  indices: number[];
  reason?: string;
}

export interface ListRunCondition extends TriggerCondition {
  runCount: number;
}

export type TriggerSettings = Pick<
  HybridSettings,
  'headingMaxChars' | 'shortBodyMaxChars' | 'shortBodyMinRun' | 'listCandidateMaxConfidence'
>;

export function detectUnknownLabels(paragraphs: readonly Paragraph[]): TriggerCondition {
  const indices = paragraphs.filter(p => p.label === 'unknown').map(p => p.index);
  return {
    fired: indices.length > 0,
    indices,
    reason: indices.length > 0 ? `${indices.length} paragraph(s) labeled unknown by rules` : undefined,
  };
}

export function detectAmbiguousHeadings(paragraphs: readonly Paragraph[], headingMaxChars: number): TriggerCondition {
  const indices = paragraphs
    .filter(p => (p.label === 'h2' || p.label === 'h3') && textLength(p.text) > headingMaxChars)
    .map(p => p.index);
  return {
    fired: indices.length > 0,
    indices,
    reason: indices.length > 0
      ? `${indices.length} h2/h3 heading(s) longer than ${headingMaxChars} characters`
      : undefined,
  };
}

function isListCandidate(paragraph: Paragraph, settings: TriggerSettings): boolean {
  return (
    paragraph.label === 'body' &&
    textLength(paragraph.text) <= settings.shortBodyMaxChars &&
    paragraph.confidence < settings.listCandidateMaxConfidence
  );
}

/**
 * Runs are taken over adjacent entries of `paragraphs`, which are expected in
 * document order.
 */
export function detectPotentialLists(paragraphs: readonly Paragraph[], settings: TriggerSettings): ListRunCondition {
  const indices: number[] = [];
  let runCount = 0;
  let run: number[] = [];

  const closeRun = () => {
    if (run.length >= settings.shortBodyMinRun) {
      indices.push(...run);
      runCount++;
    }
    run = [];
  };

  for (const paragraph of paragraphs) {
    if (isListCandidate(paragraph, settings)) {
      run.push(paragraph.index);
    } else {
      closeRun();
    }
  }
  closeRun();

  return {
    fired: runCount > 0,
    indices,
    runCount,
    reason: runCount > 0
      ? `${runCount} run(s) of ${settings.shortBodyMinRun}+ consecutive short body paragraphs (${indices.length} paragraphs)`
      : undefined,
  };
}

/**
 * Evaluate every condition. `remoteCalled` is always false here; the
 * orchestrator sets it once it has called the remote classifier.
 */
export function evaluateTriggers(paragraphs: readonly Paragraph[], settings: TriggerSettings): TriggerReport {
  const unknown = detectUnknownLabels(paragraphs);
  const headings = detectAmbiguousHeadings(paragraphs, settings.headingMaxChars);
  const lists = detectPotentialLists(paragraphs, settings);
  const conditions = [unknown, headings, lists];

  const triggeredIndices = Array.from(new Set(conditions.flatMap(c => c.indices))).sort((a, b) => a - b);
  const reasons = conditions
    .map(c => c.reason)
    .filter((reason): reason is string => reason !== undefined);

  return {
    triggered: triggeredIndices.length > 0,
    reasons,
    triggeredIndices,
    triggeredParagraphCount: triggeredIndices.length,
    totalParagraphCount: paragraphs.length,
    remoteCalled: false,
    metrics: {
      unknownCount: unknown.indices.length,
      ambiguousHeadingCount: headings.indices.length,
      potentialListRunCount: lists.runCount,
      potentialListParagraphCount: lists.indices.length,
    },
  };
}
