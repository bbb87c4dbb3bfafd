import {
  branchNameFor,
  buildPullRequestMetadata,
  commitMessageFor,
  parseRepositoryUrl,
  renderPullRequestBody,
} from '../../src/core/pull-request.js';
import type { PullRequestSubmitter } from '../../src/core/pull-request.js';
import type { InstrumentationPlan } from '../../src/core/types.js';
import { RequestAlreadySatisfiedError } from '../../src/utils/errors.js';

const bare = { language: 'go', hasMetrics: false, hasTracing: false } as const;
const withMetrics = { language: 'go', hasMetrics: true, hasTracing: false } as const;

const plan: InstrumentationPlan = {
  language: 'go',
  service: 'shop',
  mode: 'metrics',
  description: 'Add Prometheus metrics to shop (Go, mode: metrics)',
  edits: [
    { path: 'go.mod', action: 'append', content: 'require x v1' },
    { path: 'metrics/metrics.go', action: 'create', content: 'package metrics\n' },
  ],
};

describe('parseRepositoryUrl', () => {
  it('should parse HTTPS URLs', () => {
    expect(parseRepositoryUrl('https://github.com/acme/shop.git')).toEqual({
      host: 'github.com',
      owner: 'acme',
      name: 'shop',
    });
  });

  it('should parse ssh URLs with a port', () => {
    expect(parseRepositoryUrl('ssh://git@example.com:2222/acme/shop')).toEqual({
      host: 'example.com',
      owner: 'acme',
      name: 'shop',
    });
  });

  it('should parse scp-style addresses with nested groups', () => {
    expect(parseRepositoryUrl('git@gitlab.example.com:group/sub/repo.git')).toEqual({
      host: 'gitlab.example.com',
      owner: 'group/sub',
      name: 'repo',
    });
  });

  it('should return null for anything else', () => {
    expect(parseRepositoryUrl('not a url')).toBeNull();
    expect(parseRepositoryUrl('https://example.com/onlyone')).toBeNull();
  });
});

describe('branch and commit naming', () => {
  it('should describe what is actually added', () => {
    expect(branchNameFor('both', bare)).toBe('feat/add-observability');
    expect(branchNameFor('both', withMetrics)).toBe('feat/add-opentelemetry-traces');
    expect(branchNameFor('metrics', bare)).toBe('feat/add-prometheus-metrics');
    expect(commitMessageFor('traces', bare)).toBe('feat: Add OpenTelemetry distributed tracing');
    expect(commitMessageFor('both', bare)).toBe('feat: Add observability with Prometheus and OpenTelemetry');
  });

  it('should refuse to name a change that adds nothing', () => {
    const instrumented = { language: 'go', hasMetrics: true, hasTracing: true } as const;
    expect(() => branchNameFor('none', bare)).toThrow(RequestAlreadySatisfiedError);
    expect(() => commitMessageFor('metrics', withMetrics)).toThrow(
      'Go already has everything "metrics" would add; nothing to generate',
    );
    expect(() => branchNameFor('both', instrumented)).toThrow(RequestAlreadySatisfiedError);
  });
});

describe('renderPullRequestBody', () => {
  it('should list edits and what the mode includes', () => {
    expect(renderPullRequestBody(plan)).toBe(
      [
        '## Observability instrumentation',
        '',
        'Adds **metrics** instrumentation to `shop` (Go).',
        '',
        '### Changes',
        '- `go.mod`: append',
        '- `metrics/metrics.go`: create',
        '',
        "### What's included",
        '- Prometheus `/metrics` endpoint',
        '- HTTP request counter and duration histogram',
        '',
        '> Detection is heuristic: existing instrumentation may have been missed or',
        '> misattributed. Review every change before merging.',
        '',
      ].join('\n'),
    );
  });
});

describe('buildPullRequestMetadata', () => {
  it('should target main unless told otherwise', () => {
    const metadata = buildPullRequestMetadata(plan, bare);
    expect(metadata.branch).toBe('feat/add-prometheus-metrics');
    expect(metadata.baseBranch).toBe('main');
    expect(metadata.title).toBe('feat: Add Prometheus metrics instrumentation');
    expect(buildPullRequestMetadata(plan, bare, 'develop').baseBranch).toBe('develop');
  });
});

describe('PullRequestSubmitter', () => {
  it('should receive the coordinates, edits and metadata a caller builds', async () => {
    const submit = vi.fn().mockResolvedValue('https://git.example.test/acme/shop/pull/7');
    const submitter: PullRequestSubmitter = { submit };
    const repository = parseRepositoryUrl('https://git.example.test/acme/shop.git');
    if (!repository) throw new Error('expected coordinates');

    const metadata = buildPullRequestMetadata(plan, bare);
    await expect(submitter.submit(repository, plan.edits, metadata)).resolves.toBe(
      'https://git.example.test/acme/shop/pull/7',
    );
    expect(submit).toHaveBeenCalledWith(
      { host: 'git.example.test', owner: 'acme', name: 'shop' },
      plan.edits,
      expect.objectContaining({ branch: 'feat/add-prometheus-metrics', baseBranch: 'main' }),
    );
  });
});
