/**
 * Combines rule labels with remote labels into one total label set
 */
import type { FinalLabel, RemoteParagraphLabel } from '../models/Classification';
import type { Paragraph } from '../models/Paragraph';

export interface MergeOptions {
  // Remote labels below this confidence are ignored. No threshold in remote-only mode.
  threshold?: number;
}

export interface MergeOutcome {
  labels: FinalLabel[];
  adoptedIndices: number[];
  belowThresholdIndices: number[];
  // Requested paragraphs the remote reply left out or labeled unknown
  unresolvedIndices: number[];
}

export function ruleLabel(paragraph: Paragraph): FinalLabel {
  return {
    index: paragraph.index,
    label: paragraph.label,
    source: 'rule',
    confidence: paragraph.confidence,
    ruleLabel: paragraph.label,
  };
}

export function ruleLabels(paragraphs: readonly Paragraph[]): FinalLabel[] {
  return paragraphs.map(ruleLabel);
}

/**
 * One label per paragraph, in the order of `paragraphs`. A remote label is
 * adopted only for a requested index, when it is not `unknown` and meets the
 * threshold; every other paragraph keeps its rule label. When the reply holds
 * several entries for one index the first wins.
 */
export function mergeLabels(
  paragraphs: readonly Paragraph[],
  requestedIndices: Iterable<number>,
  remoteLabels: readonly RemoteParagraphLabel[],
  options: MergeOptions = {}
): MergeOutcome {
  const requested = new Set(requestedIndices);
  const remoteByIndex = new Map<number, RemoteParagraphLabel>();
  for (const remote of remoteLabels) {
    if (requested.has(remote.index) && !remoteByIndex.has(remote.index)) {
      remoteByIndex.set(remote.index, remote);
    }
  }

  const outcome: MergeOutcome = {
    labels: [],
    adoptedIndices: [],
    belowThresholdIndices: [],
    unresolvedIndices: [],
  };

  for (const paragraph of paragraphs) {
    const remote = remoteByIndex.get(paragraph.index);

    if (!remote || remote.label === 'unknown') {
      if (requested.has(paragraph.index)) {
        outcome.unresolvedIndices.push(paragraph.index);
      }
      outcome.labels.push(ruleLabel(paragraph));
    } else if (options.threshold !== undefined && remote.confidence < options.threshold) {
      outcome.belowThresholdIndices.push(paragraph.index);
      outcome.labels.push(ruleLabel(paragraph));
    } else {
      outcome.adoptedIndices.push(paragraph.index);
      outcome.labels.push({
        index: paragraph.index,
        label: remote.label,
        source: 'remote',
        confidence: remote.confidence,
        ruleLabel: paragraph.label,
      });
    }
  }

  return outcome;
}
