/**
 * index.ts
 *
 * Main entry point for the hybrid paragraph labeler.
 */

import { LabelingConfig, loadConfig } from './config';
import { ModeOrchestrator } from './core/ModeOrchestrator';
import { RemoteClassifierClient, RemoteClientOptions } from './core/RemoteClassifierClient';
import { LabelingPipeline, PipelineResult, PipelineRunOptions } from './pipeline/LabelingPipeline';
import { setLogLevel } from './utils/logger';

export * from './config';
export * from './models/Paragraph';
export * from './models/Classification';
export * from './utils/errors';
export { logger, LogLevel, setLogLevel } from './utils/logger';
export { computeDynamicTimeout, timeoutsForRequest, TransportTimeouts } from './core/TimeoutPolicy';
export { getBackoffDelayS, isRetryableFailure, shouldRetry } from './core/RetryPolicy';
export { classifyTransportFailure, describeCause } from './core/failureClassifier';
export { AxiosTransport } from './core/AxiosTransport';
export type { ClassifierTransport, ChatCompletionPayload, ChatCompletionResponse } from './core/ClassifierTransport';
export { RemoteClassifierClient, RemoteClientOptions, ExecuteOptions } from './core/RemoteClassifierClient';
export { detectRole, labelParagraphs } from './core/RuleLabeler';
export { evaluateTriggers, detectUnknownLabels, detectAmbiguousHeadings, detectPotentialLists } from './core/TriggerEvaluator';
export { mergeLabels, MergeOutcome } from './core/LabelMerger';
export { ModeOrchestrator, LabelOptions } from './core/ModeOrchestrator';
export { LabelingPipeline, DiagnosticReport, PipelineResult, PipelineRunOptions } from './pipeline/LabelingPipeline';

/**
 * Create a pipeline from a validated configuration. The configured log level
 * is applied process-wide.
 */
export function createLabelingPipeline(
  config: LabelingConfig = loadConfig(),
  clientOptions: RemoteClientOptions = {}
): LabelingPipeline {
  setLogLevel(config.logging.level);
  const client = new RemoteClassifierClient(config, clientOptions);
  return new LabelingPipeline(config, new ModeOrchestrator(config, client));
}

/**
 * Label one document's paragraph texts with a fresh pipeline
 */
export async function labelDocument(
  texts: readonly string[],
  options: PipelineRunOptions & { config?: LabelingConfig } = {}
): Promise<PipelineResult> {
  const { config, ...runOptions } = options;
  return createLabelingPipeline(config).run(texts, runOptions);
}
