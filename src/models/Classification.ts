/**
 * Models for remote classification requests, results and the final label set
 */
import { LabelingMode, LabelSource, Paragraph, ParagraphLabel } from './Paragraph';

export type ClassificationOperation = 'structure' | 'review';

export interface ClassificationRequest {
  operation: ClassificationOperation;
  paragraphs: readonly Paragraph[];                  // Full document or the triggered subset
  knownLabels?: ReadonlyMap<number, ParagraphLabel>; // Rule labels sent as context for review
}

export interface RemoteParagraphLabel {
  index: number;
  label: ParagraphLabel;
  confidence: number;
  rationale: string;
}

export const SUGGESTION_CATEGORIES = ['hierarchy', 'ambiguity', 'structure', 'style', 'terminology'] as const;
export type SuggestionCategory = (typeof SUGGESTION_CATEGORIES)[number];

export const SUGGESTION_SEVERITIES = ['low', 'medium', 'high'] as const;
export type SuggestionSeverity = (typeof SUGGESTION_SEVERITIES)[number];

export const APPLY_MODES = ['manual', 'auto'] as const;
export type ApplyMode = (typeof APPLY_MODES)[number];

export interface Suggestion {
  category: SuggestionCategory;
  severity: SuggestionSeverity;
  confidence: number;
  evidence: string;
  recommendedAction: string;
  rationale: string;
  applyMode: ApplyMode;
  paragraphIndex?: number;
}

export interface StructureResult {
  operation: 'structure';
  paragraphs: RemoteParagraphLabel[];
}

export interface ReviewResult {
  operation: 'review';
  paragraphs: RemoteParagraphLabel[];
  suggestions: Suggestion[];
}

export type ClassificationResult = StructureResult | ReviewResult;

export type FailureKind =
  | 'auth_error'
  | 'connect_timeout'
  | 'read_timeout'
  | 'timeout'
  | 'connect_error'
  | 'other_error';

export interface AttemptRecord {
  attempt: number;
  maxAttempts: number;
  timeoutS: number;
  elapsedMs: number;
  outcome: 'success' | FailureKind;
  cause?: string;
}

export interface ClassificationResponse {
  result: ClassificationResult;
  attempts: AttemptRecord[];
}

export interface TriggerMetrics {
  unknownCount: number;
  ambiguousHeadingCount: number;
  potentialListRunCount: number;
  potentialListParagraphCount: number;
}

export interface TriggerReport {
  triggered: boolean;
  reasons: string[];
  triggeredIndices: number[];
  triggeredParagraphCount: number;
  totalParagraphCount: number;
  remoteCalled: boolean;
  metrics: TriggerMetrics;
  remoteError?: string;
}

export interface FinalLabel {
  index: number;
  label: ParagraphLabel;
  source: LabelSource;
  confidence: number;
  ruleLabel: ParagraphLabel;
}

export interface LabelingFailure {
  kind: FailureKind;
  message: string;
}

export interface FinalLabelSet {
  mode: LabelingMode;
  labels: FinalLabel[];
  suggestions: Suggestion[];
  triggerReport?: TriggerReport;
  warnings: string[];
  attempts: AttemptRecord[];
  failure?: LabelingFailure;
}
