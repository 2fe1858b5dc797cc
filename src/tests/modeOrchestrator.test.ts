/**
 * Tests for mode routing, hybrid gating and guaranteed fallback
 */
import { AxiosError, AxiosHeaders } from 'axios';
import { ModeOrchestrator } from '../core/ModeOrchestrator';
import { RemoteClassifierClient } from '../core/RemoteClassifierClient';
import type { ClassificationResponse } from '../models/Classification';
import type { LabelingMode, Paragraph } from '../models/Paragraph';
import {
  chatReply,
  errorWithCode,
  paragraph,
  recordingSleep,
  ScriptedTransport,
  silenceLogs,
  testConfig,
  TransportStep,
} from './helpers';

const LONG_HEADING = '2 A heading that runs on well past thirty characters';

function orchestratorFor(mode: LabelingMode, steps: TransportStep[]) {
  const config = testConfig({ mode });
  const transport = new ScriptedTransport(steps);
  const { sleep, delays } = recordingSleep();
  const orchestrator = new ModeOrchestrator(config, new RemoteClassifierClient(config, { transport, sleep }));
  return { orchestrator, transport, delays };
}

function fifteenParagraphs(): Paragraph[] {
  return Array.from({ length: 15 }, (_, index) =>
    index === 0 || index === 7
      ? paragraph(index, LONG_HEADING, 'h2', 0.75)
      : paragraph(index, `Body line ${index}`, 'body', 0.9)
  );
}

const threeParagraphs = [
  paragraph(0, '第一章 绪论', 'h1', 0.95),
  paragraph(1, 'Item one', 'body', 0.6),
  paragraph(2, '———', 'unknown', 0.3),
];

class ExplodingClient extends RemoteClassifierClient {
  async execute(): Promise<ClassificationResponse> {
    throw new Error('exploded');
  }
}

describe('ModeOrchestrator', () => {
  let logs: ReturnType<typeof silenceLogs>;

  beforeEach(() => {
    logs = silenceLogs();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('rule mode', () => {
    test('Should return rule labels without a remote call', async () => {
      const { orchestrator, transport } = orchestratorFor('rule', [chatReply({ paragraphs: [] })]);

      const labelSet = await orchestrator.label(threeParagraphs);

      expect(labelSet.mode).toBe('rule');
      expect(labelSet.labels.map(l => [l.index, l.label, l.source])).toEqual([
        [0, 'h1', 'rule'],
        [1, 'body', 'rule'],
        [2, 'unknown', 'rule'],
      ]);
      expect(labelSet.triggerReport).toBeUndefined();
      expect(transport.calls).toHaveLength(0);
    });
  });

  describe('hybrid mode', () => {
    test('Should not call the remote classifier when nothing is flagged', async () => {
      const { orchestrator, transport } = orchestratorFor('hybrid', [chatReply({ paragraphs: [] })]);
      const paragraphs = [0, 1, 2, 3].map(index => paragraph(index, `Line ${index}`, 'body', 0.9));

      const labelSet = await orchestrator.label(paragraphs);

      expect(transport.calls).toHaveLength(0);
      expect(labelSet.labels.every(l => l.source === 'rule')).toBe(true);
      expect(labelSet.triggerReport?.triggered).toBe(false);
      expect(labelSet.triggerReport?.remoteCalled).toBe(false);
    });

    test('Should review only the flagged headings and merge the reply', async () => {
      const { orchestrator, transport } = orchestratorFor('hybrid', [
        chatReply({
          paragraphs: [
            { index: 0, paragraph_type: 'title_1', confidence: 0.9, reasoning: 'document title' },
            { index: 7, paragraph_type: 'title_3', confidence: 0.85, reasoning: 'subsection' },
            { index: 3, paragraph_type: 'title_1', confidence: 0.99, reasoning: 'not requested' },
          ],
          suggestions: [
            {
              paragraph_index: 7,
              category: 'hierarchy',
              severity: 'medium',
              confidence: 0.8,
              evidence: LONG_HEADING,
              suggestion: 'Shorten the heading',
              rationale: 'Headings this long read as body text',
              apply_mode: 'manual',
            },
          ],
        }),
      ]);

      const labelSet = await orchestrator.label(fifteenParagraphs());

      expect(transport.calls).toHaveLength(1);
      expect(transport.calls[0].timeouts.responseTimeoutMs).toBe(61000);
      expect(labelSet.labels).toHaveLength(15);
      expect(labelSet.labels[0]).toEqual({ index: 0, label: 'h1', source: 'remote', confidence: 0.9, ruleLabel: 'h2' });
      expect(labelSet.labels[7]).toEqual({ index: 7, label: 'h3', source: 'remote', confidence: 0.85, ruleLabel: 'h2' });
      expect(labelSet.labels.filter(l => l.source === 'rule').map(l => l.index)).toEqual([
        1, 2, 3, 4, 5, 6, 8, 9, 10, 11, 12, 13, 14,
      ]);
      expect(labelSet.triggerReport).toMatchObject({
        triggered: true,
        triggeredIndices: [0, 7],
        remoteCalled: true,
        reasons: ['2 h2/h3 heading(s) longer than 30 characters'],
      });
      expect(labelSet.suggestions).toEqual([
        {
          category: 'hierarchy',
          severity: 'medium',
          confidence: 0.8,
          evidence: LONG_HEADING,
          recommendedAction: 'Shorten the heading',
          rationale: 'Headings this long read as body text',
          applyMode: 'manual',
          paragraphIndex: 7,
        },
      ]);
      expect(labelSet.warnings).toEqual([]);
      expect(labelSet.failure).toBeUndefined();
    });

    test('Should keep rule labels below the confidence threshold', async () => {
      const { orchestrator } = orchestratorFor('hybrid', [
        chatReply({ paragraphs: [{ index: 0, paragraph_type: 'title_1', confidence: 0.5 }] }),
      ]);

      const labelSet = await orchestrator.label(fifteenParagraphs());

      expect(labelSet.labels[0].source).toBe('rule');
      expect(labelSet.warnings).toEqual([
        'hybrid mode: 1 of 2 reviewed paragraphs below confidence threshold 0.7, rule labels kept',
        'hybrid mode: remote reply left 1 of 2 paragraphs unresolved, rule labels kept',
      ]);
    });

    test('Should fall back to rule labels and warn when every attempt times out', async () => {
      const { orchestrator, transport, delays } = orchestratorFor('hybrid', [
        errorWithCode('ETIMEDOUT', 'timeout of 61000ms exceeded'),
      ]);
      const warning =
        'hybrid mode: remote classification failed for 2 paragraphs [read_timeout], falling back to rule labels: ' +
        'read timeout (attempt 3/3): timeout of 61000ms exceeded';

      const labelSet = await orchestrator.label(fifteenParagraphs());

      expect(transport.calls).toHaveLength(3);
      expect(delays).toEqual([1000, 2000]);
      expect(labelSet.labels.every(l => l.source === 'rule')).toBe(true);
      expect(labelSet.failure).toEqual({
        kind: 'read_timeout',
        message: 'read timeout (attempt 3/3): timeout of 61000ms exceeded',
      });
      expect(labelSet.warnings).toEqual([warning]);
      expect(labelSet.attempts).toHaveLength(3);
      expect(labelSet.triggerReport?.remoteCalled).toBe(true);
      expect(labelSet.triggerReport?.remoteError).toBe('read timeout (attempt 3/3): timeout of 61000ms exceeded');

      const lastWarning = logs.warn.mock.calls[logs.warn.mock.calls.length - 1][0];
      expect(String(lastWarning).endsWith(`[WARN] ${warning}`)).toBe(true);
    });

    test('Should degrade when the client throws something unexpected', async () => {
      const config = testConfig({ mode: 'hybrid' });
      const orchestrator = new ModeOrchestrator(config, new ExplodingClient(config));

      const labelSet = await orchestrator.label(threeParagraphs);

      expect(labelSet.labels.every(l => l.source === 'rule')).toBe(true);
      expect(labelSet.failure).toEqual({ kind: 'other_error', message: 'exploded' });
      expect(labelSet.triggerReport?.remoteCalled).toBe(false);
    });
  });

  describe('remote mode', () => {
    test('Should review every paragraph and adopt labels without a threshold', async () => {
      const { orchestrator, transport } = orchestratorFor('remote', [
        chatReply({
          paragraphs: [
            { index: 0, paragraph_type: 'title_1', confidence: 0.95 },
            { index: 1, paragraph_type: 'list_item', confidence: 0.5 },
          ],
          suggestions: [],
        }),
      ]);

      const labelSet = await orchestrator.label(threeParagraphs);

      expect(transport.calls[0].timeouts.responseTimeoutMs).toBe(61500);
      expect(labelSet.labels.map(l => [l.label, l.source])).toEqual([
        ['h1', 'remote'],
        ['list_item', 'remote'],
        ['unknown', 'rule'],
      ]);
      expect(labelSet.warnings).toEqual(['remote mode: remote reply left 1 of 3 paragraphs unresolved, rule labels kept']);
      expect(labelSet.triggerReport).toMatchObject({
        triggered: true,
        reasons: ['remote mode: all 3 paragraphs submitted'],
        triggeredIndices: [0, 1, 2],
        remoteCalled: true,
      });
    });

    test('Should fall back at once on an authentication failure', async () => {
      const unauthorized = new AxiosError('Request failed with status code 401', AxiosError.ERR_BAD_REQUEST, undefined, undefined, {
        data: {},
        status: 401,
        statusText: 'Unauthorized',
        headers: {},
        config: { headers: new AxiosHeaders() },
      });
      const { orchestrator, transport, delays } = orchestratorFor('remote', [unauthorized]);

      const labelSet = await orchestrator.label(threeParagraphs);

      expect(transport.calls).toHaveLength(1);
      expect(delays).toEqual([]);
      expect(labelSet.labels.every(l => l.source === 'rule')).toBe(true);
      expect(labelSet.failure).toEqual({
        kind: 'auth_error',
        message: 'authentication failed (attempt 1/3): Request failed with status code 401',
      });
    });

    test('Should not call the remote classifier for an empty document', async () => {
      const { orchestrator, transport } = orchestratorFor('remote', [chatReply({ paragraphs: [] })]);

      const labelSet = await orchestrator.label([]);

      expect(transport.calls).toHaveLength(0);
      expect(labelSet.labels).toEqual([]);
    });
  });

  test('Should let the call override the configured mode', async () => {
    const { orchestrator, transport } = orchestratorFor('remote', [chatReply({ paragraphs: [] })]);

    const labelSet = await orchestrator.label(threeParagraphs, { mode: 'rule' });

    expect(labelSet.mode).toBe('rule');
    expect(transport.calls).toHaveLength(0);
  });

  test('Should return labels in index order whatever the input order', async () => {
    const { orchestrator } = orchestratorFor('rule', [chatReply({ paragraphs: [] })]);

    const labelSet = await orchestrator.label([threeParagraphs[2], threeParagraphs[0], threeParagraphs[1]]);

    expect(labelSet.labels.map(l => l.index)).toEqual([0, 1, 2]);
  });

  test.each([1, 4, 9])('Should label all %i paragraphs by rules when the remote side always fails', async count => {
    const paragraphs = Array.from({ length: count }, (_, index) => paragraph(index, '———', 'unknown', 0.3));

    for (const mode of ['remote', 'hybrid'] as const) {
      const { orchestrator } = orchestratorFor(mode, [errorWithCode('ECONNREFUSED', 'connect ECONNREFUSED 127.0.0.1:443')]);

      const labelSet = await orchestrator.label(paragraphs);

      expect(labelSet.labels.map(l => l.index)).toEqual(Array.from({ length: count }, (_, index) => index));
      expect(labelSet.labels.every(l => l.source === 'rule')).toBe(true);
      expect(labelSet.failure?.kind).toBe('connect_error');
    }
  });
});
