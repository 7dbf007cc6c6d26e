/** Runs an external tool with a deadline, collecting output whatever the exit status. */

import { execFile, type ChildProcess } from 'node:child_process';
import { safeEnv } from './safeEnv.js';
import { withTimeout } from './withTimeout.js';

export interface CommandResult {
  /** Null when the process could not be started. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Set when the executable was not found or could not be spawned. */
  spawnError?: string;
}

const MAX_BUFFER = 16 * 1024 * 1024;

/** Rejects only with TimeoutError; a non-zero exit resolves with its code. */
export function runCommand(
  command: string,
  args: string[],
  cwd: string,
  timeoutMs: number,
  env: NodeJS.ProcessEnv = safeEnv(),
): Promise<CommandResult> {
  let child: ChildProcess | undefined;
  const run = new Promise<CommandResult>((resolve) => {
    child = execFile(command, args, { cwd, env, maxBuffer: MAX_BUFFER }, (err, stdout, stderr) => {
      if (!err) {
        resolve({ exitCode: 0, stdout, stderr });
      } else if (typeof err.code === 'number') {
        resolve({ exitCode: err.code, stdout, stderr });
      } else {
        resolve({ exitCode: null, stdout, stderr, spawnError: `${command}: ${err.code ?? err.message}` });
      }
    });
  });
  return withTimeout(run, timeoutMs, { childProcess: child, label: `${command} ${args.join(' ')}`.trim() });
}
