/**
 * Utilities for executing system commands
 */

import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
}

interface ExecFailure extends Error {
  stdout?: string | Buffer;
  stderr?: string | Buffer;
  code?: number | string;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return error instanceof Error;
}

function text(value: string | Buffer | undefined): string {
  return value ? value.toString().trim() : '';
}

/**
 * Execute a command without a shell and return the result.
 * Never rejects: spawn errors, non-zero exits and timeouts all come back
 * as an ExecResult. The timeout is enforced on the child process itself.
 */
export async function executeCommand(
  command: string,
  args: readonly string[] = [],
  options?: { timeout?: number; cwd?: string }
): Promise<ExecResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      timeout: options?.timeout || 30000,
      cwd: options?.cwd,
      maxBuffer: 10 * 1024 * 1024, // 10MB
      encoding: 'utf-8',
    });

    return {
      stdout: text(stdout),
      stderr: text(stderr),
      exitCode: 0,
      timedOut: false,
    };
  } catch (error: unknown) {
    if (!isExecFailure(error)) {
      return { stdout: '', stderr: String(error), exitCode: 1, timedOut: false };
    }

    // A missing binary surfaces as a string code rather than an exit status
    const exitCode = typeof error.code === 'number' ? error.code : error.code === 'ENOENT' ? 127 : 1;

    return {
      stdout: text(error.stdout),
      stderr: text(error.stderr) || error.message,
      exitCode,
      timedOut: error.killed === true && error.signal === 'SIGTERM',
    };
  }
}
