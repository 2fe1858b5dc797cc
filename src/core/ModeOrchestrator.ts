/**
 * Routes a labeling request through one of three modes:
 * - rule: deterministic labels only, no remote call
 * - remote: every paragraph is reviewed remotely, rule labels as safety net
 * - hybrid: only paragraphs flagged by the trigger evaluator are reviewed
 *
 * `label` always resolves. Remote failures degrade to rule labels and are
 * reported as warnings.
 */
import type { LabelingConfig } from '../config';
import type {
  AttemptRecord,
  ClassificationResponse,
  FailureKind,
  FinalLabelSet,
  LabelingFailure,
  TriggerReport,
} from '../models/Classification';
import type { LabelingMode, Paragraph, ParagraphLabel } from '../models/Paragraph';
import emojiLogger from '../utils/emojiLogger';
import { RemoteClassificationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { describeCause } from './failureClassifier';
import { mergeLabels, ruleLabels } from './LabelMerger';
import { RemoteClassifierClient } from './RemoteClassifierClient';
import { evaluateTriggers } from './TriggerEvaluator';

export interface LabelOptions {
  mode?: LabelingMode;
  signal?: AbortSignal;
}

type RemoteOutcome =
  | { ok: true; response: ClassificationResponse }
  | { ok: false; failure: LabelingFailure; attempts: AttemptRecord[] };

export class ModeOrchestrator {
  private config: LabelingConfig;
  private client: RemoteClassifierClient;

  constructor(config: LabelingConfig, client?: RemoteClassifierClient) {
    this.config = config;
    this.client = client || new RemoteClassifierClient(config);
  }

  async label(paragraphs: readonly Paragraph[], options: LabelOptions = {}): Promise<FinalLabelSet> {
    const mode = options.mode ?? this.config.mode;
    const ordered = [...paragraphs].sort((a, b) => a.index - b.index);

    try {
      switch (mode) {
        case 'rule':
          return this.labelWithRules(ordered);
        case 'remote':
          return await this.labelRemotely(ordered, options.signal);
        case 'hybrid':
          return await this.labelHybrid(ordered, options.signal);
        default: {
          const unsupported: never = mode;
          throw new Error(`Unsupported labeling mode: ${String(unsupported)}`);
        }
      }
    } catch (error) {
      const message = `${mode} mode: labeling failed for ${ordered.length} paragraphs [other_error], falling back to rule labels: ${describeCause(error)}`;
      logger.error(message, error);
      return {
        mode,
        labels: ruleLabels(ordered),
        suggestions: [],
        warnings: [message],
        attempts: [],
        failure: { kind: 'other_error', message: describeCause(error) },
      };
    }
  }

  private labelWithRules(paragraphs: readonly Paragraph[]): FinalLabelSet {
    emojiLogger.classify(`rule mode: ${paragraphs.length} paragraphs labeled by rules`);
    return {
      mode: 'rule',
      labels: ruleLabels(paragraphs),
      suggestions: [],
      warnings: [],
      attempts: [],
    };
  }

  private async labelRemotely(paragraphs: readonly Paragraph[], signal?: AbortSignal): Promise<FinalLabelSet> {
    const evaluated = evaluateTriggers(paragraphs, this.config.hybrid);
    const allIndices = paragraphs.map(p => p.index);
    const report: TriggerReport = {
      ...evaluated,
      triggered: allIndices.length > 0,
      reasons: allIndices.length > 0 ? [`remote mode: all ${allIndices.length} paragraphs submitted`] : [],
      triggeredIndices: allIndices,
      triggeredParagraphCount: allIndices.length,
    };

    if (paragraphs.length === 0) {
      return { mode: 'remote', labels: [], suggestions: [], triggerReport: report, warnings: [], attempts: [] };
    }

    return this.reviewAndMerge('remote', paragraphs, paragraphs, report, undefined, signal);
  }

  private async labelHybrid(paragraphs: readonly Paragraph[], signal?: AbortSignal): Promise<FinalLabelSet> {
    const report = evaluateTriggers(paragraphs, this.config.hybrid);

    if (!report.triggered) {
      emojiLogger.trigger(`hybrid mode: not triggered, ${paragraphs.length} paragraphs keep rule labels`);
      return {
        mode: 'hybrid',
        labels: ruleLabels(paragraphs),
        suggestions: [],
        triggerReport: report,
        warnings: [],
        attempts: [],
      };
    }

    emojiLogger.trigger(
      `hybrid mode: ${report.triggeredParagraphCount}/${report.totalParagraphCount} paragraphs flagged`,
      report.reasons
    );
    const flagged = new Set(report.triggeredIndices);
    const subset = paragraphs.filter(p => flagged.has(p.index));

    return this.reviewAndMerge(
      'hybrid',
      paragraphs,
      subset,
      report,
      this.config.hybrid.confidenceThreshold,
      signal
    );
  }

  private async reviewAndMerge(
    mode: LabelingMode,
    paragraphs: readonly Paragraph[],
    subset: readonly Paragraph[],
    report: TriggerReport,
    threshold: number | undefined,
    signal?: AbortSignal
  ): Promise<FinalLabelSet> {
    const outcome = await this.requestReview(subset, signal);

    if (!outcome.ok) {
      const warning = `${mode} mode: remote classification failed for ${subset.length} paragraphs [${outcome.failure.kind}], falling back to rule labels: ${outcome.failure.message}`;
      logger.warn(warning);
      return {
        mode,
        labels: ruleLabels(paragraphs),
        suggestions: [],
        triggerReport: { ...report, remoteCalled: outcome.attempts.length > 0, remoteError: outcome.failure.message },
        warnings: [warning],
        attempts: outcome.attempts,
        failure: outcome.failure,
      };
    }

    const { result, attempts } = outcome.response;
    const merged = mergeLabels(paragraphs, subset.map(p => p.index), result.paragraphs, { threshold });
    const warnings: string[] = [];

    if (merged.belowThresholdIndices.length > 0) {
      warnings.push(
        `${mode} mode: ${merged.belowThresholdIndices.length} of ${subset.length} reviewed paragraphs below confidence threshold ${threshold}, rule labels kept`
      );
    }
    if (merged.unresolvedIndices.length > 0) {
      warnings.push(
        `${mode} mode: remote reply left ${merged.unresolvedIndices.length} of ${subset.length} paragraphs unresolved, rule labels kept`
      );
    }
    warnings.forEach(warning => emojiLogger.warn(warning));

    emojiLogger.success(
      `${mode} mode: ${merged.adoptedIndices.length}/${paragraphs.length} paragraphs labeled remotely`
    );

    return {
      mode,
      labels: merged.labels,
      suggestions: result.operation === 'review' ? result.suggestions : [],
      triggerReport: { ...report, remoteCalled: true },
      warnings,
      attempts,
    };
  }

  private async requestReview(subset: readonly Paragraph[], signal?: AbortSignal): Promise<RemoteOutcome> {
    const knownLabels = new Map<number, ParagraphLabel>(subset.map(p => [p.index, p.label]));

    try {
      const response = await this.client.execute({ operation: 'review', paragraphs: subset, knownLabels }, { signal });
      return { ok: true, response };
    } catch (error) {
      if (error instanceof RemoteClassificationError) {
        return { ok: false, failure: { kind: error.kind, message: error.message }, attempts: error.attempts };
      }
      const kind: FailureKind = 'other_error';
      return { ok: false, failure: { kind, message: describeCause(error) }, attempts: [] };
    }
  }
}
