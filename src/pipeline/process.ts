import { spawnSync } from 'child_process';
import { constants } from 'os';

/** Status reported by a shell when the command cannot be found or started. */
export const COMMAND_NOT_FOUND = 127;

export interface ProcessOutcome {
  exitCode: number;
  signal?: NodeJS.Signals;
  error?: string;
}

export interface ProcessOptions {
  cwd: string;
  env: NodeJS.ProcessEnv;
}

/**
 * Run a command to completion with stdio inherited from this process.
 * Blocks until the child exits.
 */
export function runInherited(command: string, args: string[], options: ProcessOptions): ProcessOutcome {
  const result = spawnSync(command, args, {
    cwd: options.cwd,
    env: options.env,
    stdio: 'inherit',
  });

  if (result.error) {
    return { exitCode: COMMAND_NOT_FOUND, error: result.error.message };
  }

  if (result.signal) {
    return { exitCode: 128 + signalNumber(result.signal), signal: result.signal };
  }

  return { exitCode: result.status ?? 1 };
}

function signalNumber(signal: NodeJS.Signals): number {
  const signals: Partial<Record<NodeJS.Signals, number>> = constants.signals;
  return signals[signal] ?? 0;
}

/**
 * Render a command line the way `set -x` traces it.
 */
export function formatCommandLine(command: string, args: string[]): string {
  return ['+', command, ...args.map(quoteArg)].join(' ');
}

function quoteArg(arg: string): string {
  if (arg.length > 0 && /^[\w@%+=:,./-]+$/.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}
