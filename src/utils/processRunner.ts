/**
 * Secure external command execution utilities
 *
 * SECURITY: Uses spawn() with array arguments to prevent shell injection.
 * Solution names and commit messages come from the caller and must never
 * reach a shell.
 *
 * @example
 * // SECURE - Array arguments prevent injection
 * await runChecked(execCommand, 'git', ['commit', '-m', userMessage], cwd);
 *
 * // INSECURE - Never do this!
 * await execAsync(`git commit -m "${userMessage}"`, { cwd });
 */

import { spawn } from 'child_process';
import { CollaboratorFailureError } from '../errors/releaseErrors.js';

export interface CommandResult {
  stdout: string;
  stderr: string;
  code: number;
}

/**
 * Runs a command and resolves with its output. Injected into adapters so
 * tests can replace the external process with an in-process fake.
 */
export type CommandRunner = (command: string, args: string[], cwd?: string) => Promise<CommandResult>;

/**
 * Execute a command and return stdout, stderr and exit code.
 * Resolves for any exit code; rejects only when the process cannot be spawned.
 */
export function execCommand(command: string, args: string[], cwd?: string): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd,
      stdio: ['ignore', 'pipe', 'pipe']
    });

    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', (code: number | null) => {
      resolve({ stdout, stderr, code: code ?? 1 });
    });

    child.on('error', (error: Error) => {
      reject(new CollaboratorFailureError(command, null, `failed to spawn: ${error.message}`));
    });
  });
}

/**
 * Run a command through the given runner and return stdout, throwing
 * CollaboratorFailureError on a non-zero exit
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: string[],
  cwd?: string
): Promise<string> {
  const result = await runner(command, args, cwd);
  if (result.code !== 0) {
    throw new CollaboratorFailureError(`${command} ${args[0] ?? ''}`.trim(), result.code, result.stderr);
  }
  return result.stdout;
}

