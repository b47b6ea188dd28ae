/**
 * Interactive Session
 *
 * Owns one interpreter context across lines: reads a line, runs it,
 * reports printed values and errors, and keeps going after a failure.
 */

import * as readline from 'node:readline';
import type { StackwordConfig } from './config.js';
import { formatError, formatOutput, formatStack } from './cli-shared.js';
import {
  createRuntimeContext,
  interpretLine,
  type LineOutcome,
  type ObservabilityCallbacks,
  type RuntimeContext,
} from './runtime/index.js';

// ============================================================
// I/O CONTRACTS
// ============================================================

/** Blocking source of input lines */
export interface LineSource {
  /** Next line without its terminator, or null at end of input */
  readLine(prompt: string): Promise<string | null>;
}

/** Character output */
export interface OutputSink {
  write(text: string): void;
}

// ============================================================
// SESSION
// ============================================================

/** What one line produced */
export interface LineReport {
  /** Values printed by "." before the line finished or failed */
  readonly output: number[];
  readonly outcome: LineOutcome;
  readonly warnings: string[];
}

export class ReplSession {
  readonly ctx: RuntimeContext;
  private printed: number[] = [];
  private lineNumber = 0;

  constructor(
    readonly config: StackwordConfig,
    observability?: ObservabilityCallbacks
  ) {
    this.ctx = createRuntimeContext({
      stackCapacity: config.stackCapacity,
      recursionLimit: config.recursionLimit,
      callbacks: {
        onOutput: (value) => this.printed.push(value),
      },
      observability,
    });
  }

  /** Run one raw input line */
  processLine(raw: string): LineReport {
    this.lineNumber++;
    this.printed = [];
    const warnings: string[] = [];
    const { maxLineLength, maxTokens } = this.config;

    let line = raw;
    if (line.length > maxLineLength) {
      line = line.slice(0, maxLineLength);
      warnings.push(`line truncated to ${maxLineLength} characters`);
    }

    const outcome = interpretLine(line, this.ctx, {
      maxTokens,
      line: this.lineNumber,
    });
    if (outcome.truncated) {
      warnings.push(`line truncated to ${maxTokens} tokens`);
    }

    return { output: this.printed, outcome, warnings };
  }
}

/**
 * Render a line report the way the REPL prints it.
 *
 * @example
 * "1 2 + ."  -> "3 ok"
 * "DROP"     -> "Error SW-R001: Stack underflow: DROP needs 1, stack has 0 at 1:1"
 */
export function formatReport(
  report: LineReport,
  config: Pick<StackwordConfig, 'showStack'>
): string {
  const lines = report.warnings.map((warning) => `warning: ${warning}`);
  const printed = formatOutput(report.output);

  if (report.outcome.status === 'error') {
    if (printed !== '') lines.push(printed);
    lines.push(formatError(report.outcome.error));
    return lines.join('\n');
  }

  const parts = printed === '' ? ['ok'] : [printed, 'ok'];
  if (config.showStack) {
    parts.push(formatStack(report.outcome.stack));
  }
  lines.push(parts.join(' '));
  return lines.join('\n');
}

export interface ReplSummary {
  /** Lines read */
  readonly lines: number;
  /** Lines that failed */
  readonly errors: number;
}

/**
 * Read-eval-print loop. Runs until the source is exhausted.
 */
export async function runRepl(
  source: LineSource,
  sink: OutputSink,
  session: ReplSession
): Promise<ReplSummary> {
  let lines = 0;
  let errors = 0;

  for (;;) {
    const line = await source.readLine(session.config.prompt);
    if (line === null) break;

    lines++;
    const report = session.processLine(line);
    if (report.outcome.status === 'error') errors++;
    sink.write(`${formatReport(report, session.config)}\n`);
  }

  return { lines, errors };
}

// ============================================================
// NODE STREAMS
// ============================================================

/**
 * Line source over a readable stream.
 * The prompt is written only when the input is a terminal.
 */
export function createStreamSource(
  input: NodeJS.ReadableStream & { isTTY?: boolean },
  output: NodeJS.WritableStream
): LineSource & { close(): void } {
  const rl = readline.createInterface({
    input,
    crlfDelay: Infinity,
    terminal: false,
  });
  const lines = rl[Symbol.asyncIterator]();
  const interactive = input.isTTY === true;

  return {
    async readLine(prompt: string): Promise<string | null> {
      if (interactive) output.write(prompt);
      const next = await lines.next();
      return next.done === true ? null : next.value;
    },
    close(): void {
      rl.close();
    },
  };
}
