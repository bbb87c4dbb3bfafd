import { missingMode, resolveRequestedMode } from '../../src/core/mode.js';
import { RequestAlreadySatisfiedError } from '../../src/utils/errors.js';

const bare = { language: 'go', hasMetrics: false, hasTracing: false } as const;
const withMetrics = { language: 'go', hasMetrics: true, hasTracing: false } as const;
const complete = { language: 'python', hasMetrics: true, hasTracing: true } as const;

describe('resolveRequestedMode', () => {
  it('should keep a request the service fully lacks', () => {
    expect(resolveRequestedMode(bare, 'both')).toBe('both');
    expect(resolveRequestedMode(bare, 'traces')).toBe('traces');
  });

  it('should narrow both to the missing half', () => {
    expect(resolveRequestedMode(withMetrics, 'both')).toBe('traces');
  });

  it('should pass none through', () => {
    expect(resolveRequestedMode(complete, 'none')).toBe('none');
  });

  it('should reject a request that is already satisfied', () => {
    expect(() => resolveRequestedMode(withMetrics, 'metrics')).toThrow(RequestAlreadySatisfiedError);
    expect(() => resolveRequestedMode(complete, 'both')).toThrow(
      'Python already has everything "both" would add; nothing to generate',
    );
  });
});

describe('missingMode', () => {
  it('should name what the service lacks', () => {
    expect(missingMode(bare)).toBe('both');
    expect(missingMode(withMetrics)).toBe('traces');
    expect(missingMode(complete)).toBe('none');
  });
});
