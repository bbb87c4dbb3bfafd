import { modeFromDetection, parseToggleSpec, renderToggleSpec } from '../../src/core/toggle-spec.js';
import { TELEMETRY_MODES } from '../../src/core/types.js';
import { ConfigError } from '../../src/utils/errors.js';

describe('modeFromDetection', () => {
  it('should map detection flags to a mode', () => {
    expect(modeFromDetection(true, true)).toBe('both');
    expect(modeFromDetection(true, false)).toBe('metrics');
    expect(modeFromDetection(false, true)).toBe('traces');
    expect(modeFromDetection(false, false)).toBe('none');
  });
});

describe('renderToggleSpec', () => {
  it('should render the fixed document shape', () => {
    expect(renderToggleSpec('checkout', 'traces')).toBe(
      '# ToggleSpec for checkout\ntelemetry_mode: traces\nmetrics:\n  enabled: false\ntracing:\n  enabled: true\n',
    );
  });

  it('should keep the header on one line', () => {
    expect(renderToggleSpec('a\nb', 'none').split('\n')[0]).toBe('# ToggleSpec for a b');
  });

  it('should parse back to the mode it was rendered from', () => {
    for (const mode of TELEMETRY_MODES) {
      expect(parseToggleSpec(renderToggleSpec('svc', mode)).mode).toBe(mode);
    }
  });
});

describe('parseToggleSpec', () => {
  it('should return the flags', () => {
    expect(parseToggleSpec(renderToggleSpec('svc', 'both'))).toEqual({
      mode: 'both',
      metricsEnabled: true,
      tracingEnabled: true,
    });
  });

  it('should reject flags that contradict the mode', () => {
    const text = 'telemetry_mode: metrics\nmetrics:\n  enabled: false\ntracing:\n  enabled: false\n';
    expect(() => parseToggleSpec(text)).toThrow(ConfigError);
    expect(() => parseToggleSpec(text)).toThrow(
      'Invalid toggle spec: (root): enabled flags disagree with telemetry_mode',
    );
  });

  it('should reject an unknown mode', () => {
    const text = 'telemetry_mode: all\nmetrics:\n  enabled: true\ntracing:\n  enabled: true\n';
    expect(() => parseToggleSpec(text)).toThrow(/^Invalid toggle spec: telemetry_mode: /);
  });

  it('should reject malformed YAML', () => {
    expect(() => parseToggleSpec('metrics: [')).toThrow(/^Toggle spec is not valid YAML/);
  });
});
