import type { SpawnSyncReturns } from 'child_process';

/**
 * Shape of a finished `spawnSync` call, with stdio inherited (no captured output).
 */
export function exited(
  status: number | null,
  signal: NodeJS.Signals | null = null,
  error?: Error,
): SpawnSyncReturns<Buffer> {
  return {
    pid: 4242,
    output: [],
    stdout: Buffer.alloc(0),
    stderr: Buffer.alloc(0),
    status,
    signal,
    ...(error ? { error } : {}),
  };
}

export function enoent(command: string): SpawnSyncReturns<Buffer> {
  const error = Object.assign(new Error(`spawnSync ${command} ENOENT`), { code: 'ENOENT' });
  return exited(null, null, error);
}
