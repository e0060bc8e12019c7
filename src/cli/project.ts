import { findProjectRoot } from '../config/index.js';
import { openRuntime } from '../core/runtime.js';
import type { MemoryRuntime } from '../core/runtime.js';
import { error } from './ui.js';

export function requireProjectRoot(): string {
  const root = findProjectRoot();
  if (!root) {
    throw new Error('No memory store found. Run `rv init` first.');
  }
  return root;
}

/**
 * Open the runtime for the enclosing project, run `fn`, and always close the
 * store afterwards.
 */
export async function withRuntime<T>(fn: (runtime: MemoryRuntime) => T | Promise<T>): Promise<T> {
  const runtime = openRuntime(requireProjectRoot());
  try {
    return await fn(runtime);
  } finally {
    runtime.close();
  }
}

export function fail(err: unknown): never {
  console.error(error(err instanceof Error ? err.message : String(err)));
  process.exit(1);
}

export function parseNumber(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}
