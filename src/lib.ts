export { applyPlan, EditApplier, validatePlan } from './core/applier.js';
export type { AppliedEdit, ApplyResult, EditOutcome } from './core/applier.js';
export { CLASSIFIERS } from './core/classifiers/index.js';
export type { ClassifierOutput, LanguageClassifier } from './core/classifiers/index.js';
export { CONFIG_FILENAME, DEFAULT_COLLECTOR_ENDPOINT, defaultConfig, loadConfig } from './core/config.js';
export type { TracewrightConfig } from './core/config.js';
export { createScanContext, silentLogger } from './core/context.js';
export type { Logger, ScanContext } from './core/context.js';
export { generatePlan, hasGenerator, inspectLayout, PlanBuilder } from './core/generators/index.js';
export type {
  DependencyBlock,
  GenerationOptions,
  InstrumentationGenerator,
  ProjectLayout,
} from './core/generators/index.js';
export { listRemoteBranches, withCheckout } from './core/materializer.js';
export type { CheckoutOptions, RepositorySource } from './core/materializer.js';
export { missingMode, resolveRequestedMode } from './core/mode.js';
export {
  branchNameFor,
  buildPullRequestMetadata,
  commitMessageFor,
  parseRepositoryUrl,
  renderPullRequestBody,
} from './core/pull-request.js';
export type {
  PullRequestMetadata,
  PullRequestSubmitter,
  RepositoryCoordinates,
} from './core/pull-request.js';
export { scanDirectory, scanRepository } from './core/scanner.js';
export { modeFromDetection, parseToggleSpec, renderToggleSpec } from './core/toggle-spec.js';
export type { ToggleSpec } from './core/toggle-spec.js';
export * from './core/types.js';
export * from './utils/errors.js';
