import { spawn } from 'child_process';
import { SynthesisError } from '../errors';

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  timeoutMs: number;
}

export type CommandRunner = (command: string, args: string[], options: CommandOptions) => Promise<CommandResult>;

const MAX_CAPTURE_BYTES = 64 * 1024;

function sanitizeOutput(buffer: Buffer): string {
  return buffer
    .toString('utf8')
    .replace(/\u001b\[[0-9;]*m/g, '')
    .trim()
    .slice(-2000);
}

/**
 * Runs an engine as a child process. A run that outlives `timeoutMs` is killed and
 * rejected with an ENGINE_TIMEOUT SynthesisError; a missing executable is ENGINE_UNAVAILABLE.
 */
export const runCommand: CommandRunner = (command, args, options) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    let stdout = Buffer.alloc(0);
    let stderr = Buffer.alloc(0);
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      child.kill('SIGKILL');
      reject(new SynthesisError('ENGINE_TIMEOUT', `${command} did not finish within ${options.timeoutMs}ms`));
    }, options.timeoutMs);

    child.stdout.on('data', (data: Buffer) => {
      if (stdout.length < MAX_CAPTURE_BYTES) stdout = Buffer.concat([stdout, data]);
    });
    child.stderr.on('data', (data: Buffer) => {
      if (stderr.length < MAX_CAPTURE_BYTES) stderr = Buffer.concat([stderr, data]);
    });

    child.on('error', error => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(new SynthesisError('ENGINE_UNAVAILABLE', `${command} could not be started: ${error.message}`, { cause: error }));
    });

    child.on('close', code => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({ exitCode: code, stdout: sanitizeOutput(stdout), stderr: sanitizeOutput(stderr) });
    });
  });

export function assertSucceeded(command: string, result: CommandResult): void {
  if (result.exitCode !== 0) {
    const tail = result.stderr ? `: ${result.stderr}` : '';
    throw new SynthesisError('ENGINE_FAILED', `${command} exited ${result.exitCode ?? 'on a signal'}${tail}`);
  }
}
