/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES AND KINDS
// ============================================================

/** Error category determining error ID prefix (C = compile, R = runtime) */
export type ErrorCategory = 'compile' | 'runtime';

/** The failure kinds reported to the user */
export type ErrorKind =
  | 'StackOverflow'
  | 'StackUnderflow'
  | 'UnknownWord'
  | 'InvalidDefinition'
  | 'NestedDefinition'
  | 'MisplacedControlFlow'
  | 'UnbalancedControlFlow'
  | 'RecursionLimitExceeded'
  | 'DivisionByZero';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: SW-{category}{3-digit} (e.g., SW-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly kind: ErrorKind;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  getByKind(kind: ErrorKind): readonly ErrorDefinition[];
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;
  private readonly byKind: ReadonlyMap<ErrorKind, readonly ErrorDefinition[]>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();
    const kindMap = new Map<ErrorKind, ErrorDefinition[]>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
      const existing = kindMap.get(def.kind);
      if (existing) {
        existing.push(def);
      } else {
        kindMap.set(def.kind, [def]);
      }
    }

    this.byId = idMap;
    this.byKind = kindMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  getByKind(kind: ErrorKind): readonly ErrorDefinition[] {
    return this.byKind.get(kind) ?? [];
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Compile Errors (SW-C0xx)
  {
    errorId: 'SW-C001',
    category: 'compile',
    kind: 'InvalidDefinition',
    description: 'Definition without a name',
    messageTemplate: 'Expected a word name after ":", got {found}',
    resolution: 'Follow ":" with an alphabetic name, e.g. ": SQUARE DUP * ;".',
  },
  {
    errorId: 'SW-C002',
    category: 'compile',
    kind: 'InvalidDefinition',
    description: 'Definition of a reserved word',
    messageTemplate: 'Cannot redefine built-in word {name}',
    resolution: 'Pick a name that is not one of the built-in words.',
  },
  {
    errorId: 'SW-C003',
    category: 'compile',
    kind: 'NestedDefinition',
    description: 'Definition inside a definition',
    messageTemplate: 'Cannot start a definition while {name} is being compiled',
    resolution: 'Close the current definition with ";" before starting another.',
  },
  {
    errorId: 'SW-C004',
    category: 'compile',
    kind: 'MisplacedControlFlow',
    description: 'Control word outside a definition',
    messageTemplate: '{word} is only valid inside a definition',
    resolution: 'Use IF, ELSE and THEN inside ": NAME ... ;".',
  },
  {
    errorId: 'SW-C005',
    category: 'compile',
    kind: 'MisplacedControlFlow',
    description: 'Definition end without a start',
    messageTemplate: '";" without a matching ":"',
  },
  {
    errorId: 'SW-C006',
    category: 'compile',
    kind: 'UnbalancedControlFlow',
    description: 'ELSE or THEN without IF',
    messageTemplate: '{word} without a matching IF in {name}',
  },
  {
    errorId: 'SW-C007',
    category: 'compile',
    kind: 'UnbalancedControlFlow',
    description: 'IF without THEN',
    messageTemplate: '{count} unterminated IF in {name}',
    resolution: 'Close every IF with THEN before ";".',
  },
  {
    errorId: 'SW-C008',
    category: 'compile',
    kind: 'InvalidDefinition',
    description: 'Definition not terminated',
    messageTemplate: 'Definition of {name} not terminated with ";"',
    resolution: 'A definition must start and end on the same line.',
  },

  // Runtime Errors (SW-R0xx)
  {
    errorId: 'SW-R001',
    category: 'runtime',
    kind: 'StackUnderflow',
    description: 'Not enough values on the stack',
    messageTemplate: 'Stack underflow: {word} needs {needed}, stack has {depth}',
  },
  {
    errorId: 'SW-R002',
    category: 'runtime',
    kind: 'StackOverflow',
    description: 'Stack capacity exceeded',
    messageTemplate: 'Stack overflow: capacity of {capacity} reached',
    resolution: 'Drop values with DROP or CL, or raise stackCapacity.',
  },
  {
    errorId: 'SW-R003',
    category: 'runtime',
    kind: 'UnknownWord',
    description: 'Word not in the dictionary',
    messageTemplate: 'Unknown word: {name}',
  },
  {
    errorId: 'SW-R004',
    category: 'runtime',
    kind: 'RecursionLimitExceeded',
    description: 'Too many nested word calls',
    messageTemplate: 'Recursion limit of {limit} exceeded calling {name}',
    resolution: 'Guard recursive words with IF, or raise recursionLimit.',
  },
  {
    errorId: 'SW-R005',
    category: 'runtime',
    kind: 'DivisionByZero',
    description: 'Division by zero',
    messageTemplate: 'Division by zero in {word}',
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

/**
 * Replace `{name}` placeholders in a template with values from context.
 * Missing values render as an empty string. An unclosed brace leaves the
 * template unchanged.
 *
 * @example
 * renderMessage("Unknown word: {name}", { name: "FOO" })
 * // Returns: "Unknown word: FOO"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      const end = template.indexOf('}', i + 1);
      if (end === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, end)];
      if (value !== undefined) {
        result += String(value);
      }
      i = end + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
