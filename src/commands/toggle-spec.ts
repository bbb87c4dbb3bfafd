import { renderToggleSpec } from '../core/toggle-spec.js';
import { handleCommandError, parseMode } from './shared.js';

export function toggleSpecCommand(options: { service: string; mode: string }): void {
  try {
    process.stdout.write(renderToggleSpec(options.service, parseMode(options.mode)));
  } catch (error) {
    handleCommandError(error);
  }
}
