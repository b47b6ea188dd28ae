/**
 * Configuration Loader
 * Loads and validates .stackword.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { DEFAULT_MAX_TOKENS } from './lexer/index.js';
import {
  DEFAULT_RECURSION_LIMIT,
  DEFAULT_STACK_CAPACITY,
} from './runtime/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.stackword.yaml';

/** Default line buffer size */
export const DEFAULT_MAX_LINE_LENGTH = 256;

/** Upper bound for numeric settings */
const MAX_SETTING = 1_000_000;

// ============================================================
// TYPES
// ============================================================

export interface StackwordConfig {
  /** Value stack cells */
  readonly stackCapacity: number;
  /** Maximum nesting of user word calls */
  readonly recursionLimit: number;
  /** Characters kept from each input line */
  readonly maxLineLength: number;
  /** Tokens kept from each input line */
  readonly maxTokens: number;
  /** REPL prompt */
  readonly prompt: string;
  /** Print the stack after each REPL line */
  readonly showStack: boolean;
}

type NumericKey =
  | 'stackCapacity'
  | 'recursionLimit'
  | 'maxLineLength'
  | 'maxTokens';

const NUMERIC_KEYS: readonly NumericKey[] = [
  'stackCapacity',
  'recursionLimit',
  'maxLineLength',
  'maxTokens',
];

const KNOWN_KEYS: ReadonlySet<string> = new Set([
  ...NUMERIC_KEYS,
  'prompt',
  'showStack',
]);

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): StackwordConfig {
  return {
    stackCapacity: DEFAULT_STACK_CAPACITY,
    recursionLimit: DEFAULT_RECURSION_LIMIT,
    maxLineLength: DEFAULT_MAX_LINE_LENGTH,
    maxTokens: DEFAULT_MAX_TOKENS,
    prompt: '> ',
    showStack: false,
  };
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readPositiveInteger(
  data: Record<string, unknown>,
  key: NumericKey,
  fallback: number
): number {
  const value = data[key];
  if (value === undefined) return fallback;
  if (
    typeof value !== 'number' ||
    !Number.isInteger(value) ||
    value < 1 ||
    value > MAX_SETTING
  ) {
    throw new Error(
      `Invalid configuration: ${key} must be an integer between 1 and ${MAX_SETTING}`
    );
  }
  return value;
}

/**
 * Validate parsed YAML and merge it over the defaults.
 * Throws Error naming the first invalid key.
 */
export function validateConfig(data: unknown): StackwordConfig {
  const defaults = createDefaultConfig();

  // An empty document parses to null
  if (data === null || data === undefined) {
    return defaults;
  }
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  const prompt = data['prompt'] ?? defaults.prompt;
  if (typeof prompt !== 'string') {
    throw new Error('Invalid configuration: prompt must be a string');
  }

  const showStack = data['showStack'] ?? defaults.showStack;
  if (typeof showStack !== 'boolean') {
    throw new Error('Invalid configuration: showStack must be a boolean');
  }

  return {
    stackCapacity: readPositiveInteger(
      data,
      'stackCapacity',
      defaults.stackCapacity
    ),
    recursionLimit: readPositiveInteger(
      data,
      'recursionLimit',
      defaults.recursionLimit
    ),
    maxLineLength: readPositiveInteger(
      data,
      'maxLineLength',
      defaults.maxLineLength
    ),
    maxTokens: readPositiveInteger(data, 'maxTokens', defaults.maxTokens),
    prompt,
    showStack,
  };
}

// ============================================================
// LOADING
// ============================================================

/** Parse configuration from YAML text */
export function parseConfig(text: string): StackwordConfig {
  let data: unknown;
  try {
    data = yaml.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid configuration: ${message}`);
  }
  return validateConfig(data);
}

/**
 * Load configuration from `dir`.
 * Returns defaults when the file is absent.
 */
export function loadConfig(dir: string): StackwordConfig {
  const configPath = join(dir, CONFIG_FILE_NAME);
  if (!existsSync(configPath)) {
    return createDefaultConfig();
  }
  return parseConfig(readFileSync(configPath, 'utf-8'));
}
