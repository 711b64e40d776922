import { config } from '../config';

// One-time warning utility keyed by a stable identifier.
const seen = new Set<string>();

export function onceWarn(key: string, message: string): void {
  if (!config.warnings || seen.has(key)) return;
  // eslint-disable-next-line no-console
  console.warn(message);
  seen.add(key);
}

/** Emit a runtime warning when `config.warnings` is enabled. */
export function warn(message: string): void {
  // eslint-disable-next-line no-console
  if (config.warnings) console.warn(message);
}

/** Forget keys recorded by `onceWarn` (tests only). */
export function resetWarnings(): void {
  seen.clear();
}
