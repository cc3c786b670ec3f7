import { config } from '../config';

// One-time warning utility gated by `config.warnings`.
const seen = new Set<string>();

/**
 * Print `message` through `console.warn` the first time `key` is seen, and
 * only while `config.warnings` is enabled.
 *
 * @returns true when the warning was emitted by this call.
 */
export function onceWarn(key: string, message: string): boolean {
  if (!config.warnings || seen.has(key)) return false;
  // eslint-disable-next-line no-console
  console.warn(message);
  seen.add(key);
  return true;
}

/** Forget every emitted key so the next `onceWarn` fires again (test hook). */
export function resetWarnings(): void {
  seen.clear();
}
