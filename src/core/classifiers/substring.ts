import { lineHasCodeMatch } from '../source-text.js';
import { TELEMETRY_KINDS } from '../types.js';
import { emptyFindings } from './base.js';
import type { FileFindings, KindRecord } from './types.js';

export interface SubstringRules {
  /** Substrings that show the library is imported or referenced by its full path. */
  importMarkers: KindRecord<readonly string[]>;
  /** Usage allowlist, matched literally. */
  usages: KindRecord<readonly string[]>;
}

/** `import`, `using`, `use`, `package` and `extern crate` statements never count as usage. */
const IMPORT_STATEMENT = /^\s*(?:pub\s+)?(?:import|using|use|package|extern\s+crate)\s/;

/**
 * Line-oriented two-pass analysis for languages without a structural
 * classifier. Both passes apply the same-line comment filter.
 */
export function createSubstringAnalyzer(rules: SubstringRules): (text: string) => FileFindings {
  return (text) => {
    const findings = emptyFindings();
    const lines = text.split('\n');

    for (const kind of TELEMETRY_KINDS) {
      const imported = lines.some((line) =>
        rules.importMarkers[kind].some((marker) => lineHasCodeMatch(line, marker)),
      );
      if (!imported) continue;
      findings.imports.add(kind);

      for (const line of lines) {
        if (IMPORT_STATEMENT.test(line)) continue;
        for (const pattern of rules.usages[kind]) {
          if (lineHasCodeMatch(line, pattern)) findings.usages[kind].add(pattern);
        }
      }
    }

    return findings;
  };
}
