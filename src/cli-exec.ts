#!/usr/bin/env node
/**
 * CLI Execution Entry Point
 *
 * Implements main(), parseArgs() and runScript() for the stackword binary:
 * an interactive session on a terminal, or line-by-line execution of a
 * script file or stdin.
 */

import * as fs from 'node:fs/promises';
import * as fsSync from 'node:fs';
import { loadConfig, type StackwordConfig } from './config.js';
import {
  createStreamSource,
  ReplSession,
  runRepl,
  type OutputSink,
} from './cli-repl.js';
import {
  createTraceCallbacks,
  formatError,
  formatOutput,
  formatStack,
  readVersion,
} from './cli-shared.js';
import { tokenize } from './lexer/index.js';
import { formatToken } from './types.js';

/**
 * Parsed command-line arguments
 */
export type Command =
  | { mode: 'repl' }
  | { mode: 'exec'; file: string }
  | { mode: 'eval'; line: string }
  | { mode: 'help' | 'version' };

export interface ParsedArgs {
  readonly command: Command;
  /** Print tokens instead of executing */
  readonly tokens: boolean;
  /** Write observability events to stderr */
  readonly trace: boolean;
}

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseArgs(argv: string[]): ParsedArgs {
  let tokens = false;
  let trace = false;
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) break;

    switch (arg) {
      case '--help':
      case '-h':
        return { command: { mode: 'help' }, tokens, trace };
      case '--version':
      case '-v':
        return { command: { mode: 'version' }, tokens, trace };
      case '--tokens':
        tokens = true;
        break;
      case '--trace':
        trace = true;
        break;
      case '-e': {
        const line = argv[i + 1];
        if (line === undefined) {
          throw new Error('Missing line after -e');
        }
        return {
          command: { mode: 'eval', line },
          tokens: tokens || argv.slice(i + 2).includes('--tokens'),
          trace: trace || argv.slice(i + 2).includes('--trace'),
        };
      }
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new Error(`Unknown option: ${arg}`);
        }
        positionals.push(arg);
    }
  }

  const [file, ...extra] = positionals;
  if (extra.length > 0) {
    throw new Error(`Unexpected argument: ${extra.join(' ')}`);
  }
  if (file === undefined) {
    return { command: { mode: 'repl' }, tokens, trace };
  }
  return { command: { mode: 'exec', file }, tokens, trace };
}

/** Render the tokens of a line, e.g. "INT(1) INT(2) + ." */
export function dumpTokens(line: string, maxTokens?: number): string {
  return tokenize(line, { maxTokens })
    .tokens.map(formatToken)
    .join(' ');
}

export interface ScriptResult {
  /** 0 when every line ran, 1 after the first failing line */
  readonly exitCode: number;
  /** Lines executed, including a failing one */
  readonly lines: number;
}

/**
 * Run a script line by line, stopping at the first failing line.
 * Printed values go to `stdout` one line of output per source line;
 * errors go to `stderr`.
 */
export function runScript(
  source: string,
  session: ReplSession,
  stdout: OutputSink,
  stderr: OutputSink
): ScriptResult {
  const lines = source.split(/\r?\n/);
  let executed = 0;

  for (const line of lines) {
    executed++;
    const report = session.processLine(line);
    for (const warning of report.warnings) {
      stderr.write(`warning: ${warning}\n`);
    }
    if (report.output.length > 0) {
      stdout.write(`${formatOutput(report.output)}\n`);
    }
    if (report.outcome.status === 'error') {
      stderr.write(`${formatError(report.outcome.error)}\n`);
      return { exitCode: 1, lines: executed };
    }
  }

  return { exitCode: 0, lines: executed };
}

/**
 * Run the line given with -e, then print the stack it leaves.
 * Line and token limits apply as in a script.
 */
export function runEval(
  line: string,
  session: ReplSession,
  stdout: OutputSink,
  stderr: OutputSink
): ScriptResult {
  const result = runScript(line, session, stdout, stderr);
  if (result.exitCode === 0) {
    stdout.write(`${formatStack(session.ctx.stack.toArray())}\n`);
  }
  return result;
}

async function readSource(file: string): Promise<string> {
  if (file === '-') {
    return fsSync.readFileSync(0, 'utf-8');
  }
  return fs.readFile(file, 'utf-8');
}

function showHelp(): void {
  console.log(`Usage:
  stackword                      Start an interactive session
  stackword <script>             Run a script file line by line
  stackword -                    Run a script read from stdin
  stackword -e <line>            Run one line and print the stack
  stackword --help               Show this help message
  stackword --version            Show version information

Options:
  --tokens    Print the tokens of each line instead of running it
  --trace     Print word calls, definitions and errors to stderr

Configuration is read from .stackword.yaml in the working directory.

Examples:
  stackword -e '1 2 + .'
  stackword -e ': SQUARE DUP * ; 4 SQUARE .'
  echo '5 3 - .' | stackword -`);
}

const stdoutSink: OutputSink = {
  write: (text) => {
    process.stdout.write(text);
  },
};

const stderrSink: OutputSink = {
  write: (text) => {
    process.stderr.write(text);
  },
};

async function runCommand(
  parsed: ParsedArgs,
  config: StackwordConfig
): Promise<number> {
  const { command } = parsed;
  const observability = parsed.trace
    ? createTraceCallbacks((line) => console.error(line))
    : undefined;

  switch (command.mode) {
    case 'help':
      showHelp();
      return 0;

    case 'version':
      console.log(readVersion());
      return 0;

    case 'eval': {
      if (parsed.tokens) {
        console.log(dumpTokens(command.line, config.maxTokens));
        return 0;
      }
      const session = new ReplSession(config, observability);
      return runEval(command.line, session, stdoutSink, stderrSink).exitCode;
    }

    case 'exec': {
      const source = await readSource(command.file);
      if (parsed.tokens) {
        for (const line of source.split(/\r?\n/)) {
          console.log(dumpTokens(line, config.maxTokens));
        }
        return 0;
      }
      const session = new ReplSession(config, observability);
      return runScript(source, session, stdoutSink, stderrSink).exitCode;
    }

    case 'repl': {
      const source = createStreamSource(process.stdin, process.stdout);
      try {
        if (parsed.tokens) {
          for (;;) {
            const line = await source.readLine(config.prompt);
            if (line === null) break;
            console.log(dumpTokens(line, config.maxTokens));
          }
          return 0;
        }
        const session = new ReplSession(config, observability);
        await runRepl(source, stdoutSink, session);
        return 0;
      } finally {
        source.close();
      }
    }
  }
}

/**
 * Entry point for the stackword binary
 *
 * Parses command-line arguments, runs the command and sets the exit code.
 */
export async function main(): Promise<void> {
  try {
    const parsed = parseArgs(process.argv.slice(2));
    const config = loadConfig(process.cwd());
    process.exitCode = await runCommand(parsed, config);
  } catch (err) {
    if (err instanceof Error) {
      console.error(formatError(err));
    } else {
      console.error(formatError(new Error(String(err))));
    }
    process.exitCode = 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  void main();
}
