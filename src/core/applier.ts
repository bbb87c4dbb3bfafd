import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, join, relative, resolve } from 'node:path';

import { ApplyError, PlanValidationError, errorMessage } from '../utils/errors.js';
import { silentLogger } from './context.js';
import type { Logger } from './context.js';
import type { EditAction, FileEdit, InstrumentationPlan } from './types.js';

export type EditOutcome = 'created' | 'appended' | 'inserted' | 'appended-fallback' | 'unchanged';

export interface AppliedEdit {
  path: string;
  action: EditAction;
  outcome: EditOutcome;
}

export interface ApplyResult {
  edits: AppliedEdit[];
  created: string[];
  modified: string[];
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Rejects a plan the applier cannot honour before anything is written:
 * paths outside the tree, `modify` without anchor, `create` after another
 * edit to the same path.
 */
export function validatePlan(workingTree: string, plan: InstrumentationPlan): void {
  const root = resolve(workingTree);
  const touched = new Set<string>();
  for (const edit of plan.edits) {
    const rel = relative(root, resolve(root, edit.path));
    if (!edit.path || isAbsolute(edit.path) || rel.startsWith('..') || isAbsolute(rel)) {
      throw new PlanValidationError(edit.path, 'path escapes the working tree');
    }
    if (edit.action === 'modify' && !edit.anchor?.trim()) {
      throw new PlanValidationError(edit.path, 'modify requires an anchor');
    }
    if (edit.action === 'create' && touched.has(edit.path)) {
      throw new PlanValidationError(edit.path, 'create after another edit to the same file');
    }
    touched.add(edit.path);
  }
}

function parsesAsJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

function appendAtEnd(existing: string, content: string): string {
  const head = existing === '' || existing.endsWith('\n') ? existing : `${existing}\n`;
  return content.endsWith('\n') ? head + content : `${head}${content}\n`;
}

function insertAfterLine(lines: string[], index: number, content: string): string {
  const inserted = content.replace(/\n$/, '').split('\n');
  return [...lines.slice(0, index + 1), ...inserted, ...lines.slice(index + 1)].join('\n');
}

/**
 * Writes plan edits into a working tree, one file at a time, in plan order.
 * A failure part way leaves earlier edits in place.
 */
export class EditApplier {
  private readonly created = new Set<string>();
  private readonly modified = new Set<string>();
  private readonly root: string;

  constructor(
    workingTree: string,
    private readonly logger: Logger = silentLogger,
  ) {
    this.root = resolve(workingTree);
  }

  async apply(edit: FileEdit): Promise<AppliedEdit> {
    const target = join(this.root, edit.path);
    const existing = await this.read(edit.path, target);
    const outcome =
      edit.action === 'create'
        ? await this.create(edit, target, existing)
        : await this.extend(edit, target, existing);
    return { path: edit.path, action: edit.action, outcome };
  }

  summary(): { created: string[]; modified: string[] } {
    return { created: [...this.created], modified: [...this.modified] };
  }

  private async create(edit: FileEdit, target: string, existing: string | null): Promise<EditOutcome> {
    if (existing !== null) {
      if (existing === edit.content) return 'unchanged';
      throw new ApplyError(edit.path, 'file already exists with different content');
    }
    await this.write(edit.path, target, edit.content, true);
    this.created.add(edit.path);
    return 'created';
  }

  private async extend(edit: FileEdit, target: string, existing: string | null): Promise<EditOutcome> {
    if (existing === null) {
      throw new ApplyError(edit.path, `cannot ${edit.action} a file that does not exist`);
    }
    const snippet = edit.content.trim();
    if (snippet && existing.includes(snippet)) return 'unchanged';

    let next: string;
    let outcome: EditOutcome;
    if (edit.anchor === undefined) {
      next = appendAtEnd(existing, edit.content);
      outcome = 'appended';
    } else {
      const { anchor } = edit;
      const lines = existing.split('\n');
      const index = lines.findIndex((line) => line.includes(anchor));
      if (index === -1) {
        this.logger.warn(`AnchorNotFound: "${anchor}" not in ${edit.path}; appending at end of file`);
        next = appendAtEnd(existing, edit.content);
        outcome = 'appended-fallback';
      } else {
        next = insertAfterLine(lines, index, edit.content);
        outcome = 'inserted';
      }
    }

    if (edit.path.endsWith('.json') && parsesAsJson(existing) && !parsesAsJson(next)) {
      throw new ApplyError(edit.path, 'edit would leave invalid JSON');
    }
    await this.write(edit.path, target, next, false);
    if (!this.created.has(edit.path)) this.modified.add(edit.path);
    return outcome;
  }

  private async read(path: string, target: string): Promise<string | null> {
    try {
      return await readFile(target, 'utf-8');
    } catch (error) {
      if (isMissing(error)) return null;
      throw new ApplyError(path, errorMessage(error), { cause: error });
    }
  }

  private async write(path: string, target: string, content: string, makeParent: boolean): Promise<void> {
    try {
      if (makeParent) await mkdir(dirname(target), { recursive: true });
      await writeFile(target, content, 'utf-8');
    } catch (error) {
      throw new ApplyError(path, errorMessage(error), { cause: error });
    }
  }
}

/**
 * Applies every edit of `plan` to `workingTree` in order. On `ApplyError`
 * the tree may hold a partial result and should be discarded.
 */
export async function applyPlan(
  workingTree: string,
  plan: InstrumentationPlan,
  logger: Logger = silentLogger,
): Promise<ApplyResult> {
  validatePlan(workingTree, plan);
  const applier = new EditApplier(workingTree, logger);
  const edits: AppliedEdit[] = [];
  for (const edit of plan.edits) {
    edits.push(await applier.apply(edit));
  }
  return { edits, ...applier.summary() };
}
