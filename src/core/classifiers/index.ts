import { dotnetClassifier } from './dotnet.js';
import { goClassifier } from './go.js';
import { javaClassifier } from './java.js';
import { nodeClassifier } from './node.js';
import { pythonClassifier } from './python.js';
import { rustClassifier } from './rust.js';
import type { LanguageClassifier } from './types.js';

/** Fixed registry order; scan output is merged in this order. */
export const CLASSIFIERS: readonly LanguageClassifier[] = [
  goClassifier,
  pythonClassifier,
  javaClassifier,
  nodeClassifier,
  dotnetClassifier,
  rustClassifier,
];

export type { ClassifierOutput, FileFindings, LanguageClassifier } from './types.js';
