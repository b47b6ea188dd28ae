/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import * as fs from 'node:fs';
import {
  formatBody,
  type ObservabilityCallbacks,
} from './runtime/index.js';
import { isStackwordError } from './types.js';

/**
 * Format the values printed by "." on one line.
 *
 * @example
 * formatOutput([3, -1]) // "3 -1"
 */
export function formatOutput(values: readonly number[]): string {
  return values.join(' ');
}

/**
 * Format the stack with its depth, bottom first.
 *
 * @example
 * formatStack([1, 2]) // "<2> 1 2"
 * formatStack([])     // "<0>"
 */
export function formatStack(stack: readonly number[]): string {
  return [`<${stack.length}>`, ...stack.map(String)].join(' ');
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (isStackwordError(err)) {
    return `Error ${err.errorId}: ${err.message}`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Observability callbacks that write one trace line per event.
 *
 * @param write - Sink for trace lines, e.g. console.error
 */
export function createTraceCallbacks(
  write: (line: string) => void
): ObservabilityCallbacks {
  return {
    onWordCall: ({ name, depth }) =>
      write(`[trace] call ${name} (depth ${depth})`),
    onWordReturn: ({ name, depth, durationMs }) =>
      write(
        `[trace] return ${name} (depth ${depth}, ${durationMs.toFixed(3)}ms)`
      ),
    onDefine: ({ name, body, replaced }) => {
      const source = formatBody({ kind: 'user', name, body });
      write(`[trace] ${replaced ? 'redefine' : 'define'} ${name}: ${source}`);
    },
    onError: ({ error }) => write(`[trace] error ${formatError(error)}`),
  };
}

/**
 * Read the package version from package.json beside the compiled sources.
 */
export function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson: unknown = JSON.parse(
    fs.readFileSync(packageJsonPath, 'utf-8')
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}
