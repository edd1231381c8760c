import { ENVIRONMENTS, buildPdfUrl, isEnvironmentName } from '../../src/domain/environment';
import { FlowPhase, RunContext, StepKey, toFlowRun } from '../../src/domain/run';

describe('environments', () => {
  it('builds the public PDF url from the media id', () => {
    expect(buildPdfUrl(ENVIRONMENTS.qa, 303)).toBe('https://q.eddy.pro/pdf/303');
    expect(buildPdfUrl(ENVIRONMENTS.prod, 42)).toBe('https://eddy.pro/pdf/42');
    expect(buildPdfUrl({ ...ENVIRONMENTS.qa, pdfBaseUrl: 'https://pdf.test/' }, 1)).toBe('https://pdf.test/pdf/1');
  });

  it('recognizes environment names', () => {
    expect(isEnvironmentName('qa')).toBe(true);
    expect(isEnvironmentName('prod')).toBe(true);
    expect(isEnvironmentName('staging')).toBe(false);
  });
});

describe('toFlowRun', () => {
  it('snapshots the context without credentials', () => {
    const ctx: RunContext = {
      runId: 'run_1',
      credentials: { apiKey: 'test-token-0001', organizationId: 949 },
      environment: ENVIRONMENTS.qa,
      cleanupRequested: false,
      state: StepKey.CreateLinkpage,
      transitions: [FlowPhase.NotStarted, StepKey.CreateLinkpage],
      stepResults: new Map([
        [
          StepKey.CreateLinkpage,
          {
            stepKey: StepKey.CreateLinkpage,
            status: 201,
            body: { id: 101 },
            outputs: { linkpage_id: 101 },
            timestamp: '2026-01-01T00:00:01Z',
            attempts: 1,
            durationMs: 5,
          },
        ],
      ]),
      flow: { linkpage_id: 101 },
      startedAt: '2026-01-01T00:00:00Z',
    };

    const run = toFlowRun(ctx);
    ctx.transitions.push(FlowPhase.Failed);

    expect(run.environment).toBe('qa');
    expect(run.organizationId).toBe(949);
    expect(run.transitions).toEqual(['not_started', '1-create-linkpage']);
    expect(Object.keys(run.stepResults)).toEqual(['1-create-linkpage']);
    expect(JSON.stringify(run)).not.toContain('test-token-0001');
  });
});
