/**
 * Call sites pulled from comment- and string-masked source. `chain` is the
 * selector path of the callee: `prometheus.DefaultRegisterer.MustRegister(`
 * gives ['prometheus', 'DefaultRegisterer', 'MustRegister']. Calls on a call
 * or index result start with the placeholder '()'.
 */
export interface CallSite {
  chain: string[];
  line: number;
}

export const RESULT_RECEIVER = '()';

const IDENT = '[A-Za-z_][A-Za-z0-9_]*';
const SELECTOR_TAIL = `(?:\\s*\\.\\s*${IDENT})`;
const CALL_CHAIN = new RegExp(`(?<![\\w.])(${IDENT}${SELECTOR_TAIL}*)\\s*\\(`, 'g');
const RESULT_CHAIN = new RegExp(`[)\\]](${SELECTOR_TAIL}+)\\s*\\(`, 'g');

function splitChain(raw: string): string[] {
  return raw
    .split('.')
    .map((part) => part.trim())
    .filter(Boolean);
}

function lineAt(index: number, lineStarts: number[]): number {
  let lo = 0;
  let hi = lineStarts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (lineStarts[mid] <= index) lo = mid;
    else hi = mid - 1;
  }
  return lo + 1;
}

export function extractCallSites(masked: string): CallSite[] {
  const lineStarts = [0];
  for (let i = 0; i < masked.length; i++) {
    if (masked[i] === '\n') lineStarts.push(i + 1);
  }

  const sites: CallSite[] = [];
  for (const match of masked.matchAll(CALL_CHAIN)) {
    sites.push({ chain: splitChain(match[1]), line: lineAt(match.index ?? 0, lineStarts) });
  }
  for (const match of masked.matchAll(RESULT_CHAIN)) {
    sites.push({
      chain: [RESULT_RECEIVER, ...splitChain(match[1])],
      line: lineAt(match.index ?? 0, lineStarts),
    });
  }
  return sites.sort((a, b) => a.line - b.line);
}
