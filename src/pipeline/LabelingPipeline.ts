/**
 * LabelingPipeline.ts
 *
 * Runs the full labeling workflow for one document: rule labels, mode
 * routing through the orchestrator, then a diagnostic report that can be
 * written to disk.
 */

import path from 'path';
import fs from 'fs-extra';
import { v4 as uuidv4 } from 'uuid';
import type { LabelingConfig } from '../config';
import { ModeOrchestrator } from '../core/ModeOrchestrator';
import { labelParagraphs } from '../core/RuleLabeler';
import type {
  AttemptRecord,
  FinalLabelSet,
  LabelingFailure,
  Suggestion,
  TriggerReport,
} from '../models/Classification';
import type { LabelingMode, LabelSource, ParagraphLabel } from '../models/Paragraph';
import emojiLogger from '../utils/emojiLogger';
import { logger } from '../utils/logger';

export interface PipelineRunOptions {
  documentId?: string;
  mode?: LabelingMode;
  signal?: AbortSignal;
}

/**
 * Diagnostic report for one labeling run
 */
export interface DiagnosticReport {
  runId: string;
  documentId: string;
  mode: LabelingMode;
  generatedAt: string;
  paragraphCount: number;
  sourceCounts: Record<LabelSource, number>;
  labelCounts: Partial<Record<ParagraphLabel, number>>;
  triggerReport: TriggerReport | null;
  suggestions: Suggestion[];
  warnings: string[];
  attempts: AttemptRecord[];
  failure: LabelingFailure | null;
}

/**
 * Pipeline processing result
 */
export interface PipelineResult {
  labelSet: FinalLabelSet;
  report: DiagnosticReport;
  reportPath?: string;
  processingTimeMs: number;
}

export function buildDiagnosticReport(
  labelSet: FinalLabelSet,
  runId: string,
  documentId: string
): DiagnosticReport {
  const sourceCounts: Record<LabelSource, number> = { rule: 0, remote: 0 };
  const labelCounts: Partial<Record<ParagraphLabel, number>> = {};

  for (const label of labelSet.labels) {
    sourceCounts[label.source]++;
    labelCounts[label.label] = (labelCounts[label.label] ?? 0) + 1;
  }

  return {
    runId,
    documentId,
    mode: labelSet.mode,
    generatedAt: new Date().toISOString(),
    paragraphCount: labelSet.labels.length,
    sourceCounts,
    labelCounts,
    triggerReport: labelSet.triggerReport ?? null,
    suggestions: labelSet.suggestions,
    warnings: labelSet.warnings,
    attempts: labelSet.attempts,
    failure: labelSet.failure ?? null,
  };
}

/**
 * File name for a document's report; path separators and other unsafe
 * characters become underscores.
 */
export function reportFileName(documentId: string): string {
  return `${documentId.replace(/[^\w.-]+/g, '_')}.report.json`;
}

export class LabelingPipeline {
  private config: LabelingConfig;
  private orchestrator: ModeOrchestrator;

  constructor(config: LabelingConfig, orchestrator?: ModeOrchestrator) {
    this.config = config;
    this.orchestrator = orchestrator || new ModeOrchestrator(config);

    logger.info('LabelingPipeline initialized');
  }

  /**
   * Label the paragraphs of one document, given their texts in document order
   */
  public async run(texts: readonly string[], options: PipelineRunOptions = {}): Promise<PipelineResult> {
    const stopTimer = emojiLogger.timerStart('labeling run');
    const runId = uuidv4();
    const documentId = options.documentId || runId;

    emojiLogger.document(`Labeling ${documentId} (${texts.length} paragraphs)`);

    const paragraphs = labelParagraphs(texts, { shortBodyMaxChars: this.config.hybrid.shortBodyMaxChars });
    const labelSet = await this.orchestrator.label(paragraphs, { mode: options.mode, signal: options.signal });
    const report = buildDiagnosticReport(labelSet, runId, documentId);

    const result: PipelineResult = {
      labelSet,
      report,
      processingTimeMs: 0,
    };

    if (this.config.report.writeReport) {
      result.reportPath = await this.writeReport(report);
    }

    result.processingTimeMs = stopTimer();
    emojiLogger.pipeline(
      `${documentId}: ${report.sourceCounts.remote} remote / ${report.sourceCounts.rule} rule labels in ${result.processingTimeMs}ms`
    );

    return result;
  }

  /**
   * Returns the written path, or undefined when writing failed
   */
  private async writeReport(report: DiagnosticReport): Promise<string | undefined> {
    const outputDir = this.config.report.outputDir;
    const reportPath = path.join(outputDir, reportFileName(report.documentId));

    try {
      await fs.ensureDir(outputDir);
      await fs.writeJson(reportPath, report, { spaces: 2 });
      logger.info(`Diagnostic report saved to ${reportPath}`);
      return reportPath;
    } catch (error) {
      logger.error(`Failed to write diagnostic report to ${reportPath}`, error);
      return undefined;
    }
  }
}
