import { PlanValidationError } from '../../utils/errors.js';
import type { FileEdit, InstrumentationPlan, Language, TelemetryMode } from '../types.js';

/**
 * Accumulates edits in order and rejects ones the applier could not honour:
 * paths escaping the working tree, `modify` without an anchor, and `create`
 * on a path the plan already touched.
 */
export class PlanBuilder {
  private readonly edits: FileEdit[] = [];
  private readonly touched = new Set<string>();

  add(edit: FileEdit): this {
    const { path } = edit;
    if (!path || path.startsWith('/') || path.split('/').includes('..')) {
      throw new PlanValidationError(path, 'path must be relative to the working tree');
    }
    if (edit.action === 'modify' && !edit.anchor?.trim()) {
      throw new PlanValidationError(path, 'modify requires an anchor');
    }
    if (edit.action === 'create') {
      if (edit.anchor !== undefined) {
        throw new PlanValidationError(path, 'create takes no anchor');
      }
      if (this.touched.has(path)) {
        throw new PlanValidationError(path, 'create after another edit to the same file');
      }
    }
    this.edits.push(edit);
    this.touched.add(path);
    return this;
  }

  /** True when an earlier edit targets `path`. */
  has(path: string): boolean {
    return this.touched.has(path);
  }

  create(path: string, content: string): this {
    return this.add({ path, action: 'create', content });
  }

  append(path: string, content: string, anchor?: string): this {
    const edit: FileEdit = { path, action: 'append', content };
    return this.add(anchor === undefined ? edit : { ...edit, anchor });
  }

  modify(path: string, content: string, anchor: string): this {
    return this.add({ path, action: 'modify', content, anchor });
  }

  build(meta: {
    language: Language;
    service: string;
    mode: TelemetryMode;
    description: string;
  }): InstrumentationPlan {
    return { ...meta, edits: [...this.edits] };
  }
}
