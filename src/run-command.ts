/**
 * Command Runner
 * Layer: infra
 *
 * Provided ports:
 *   - command.run
 *
 * Runs a short-lived helper (service, crontab) to completion and
 * collects its output. Never rejects: spawn failures come back as
 * ok=false with the error text in stderr.
 */

import { spawn } from 'child_process';

export interface CommandResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  /** Exit code, or null when the process was killed by a signal or never started */
  code: number | null;
}

export function runCommand(command: string, args: string[], input?: string): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve) => {
    const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });
    child.on('error', (err) => {
      resolve({ ok: false, stdout: '', stderr: String(err), code: null });
    });
    child.on('close', (code) => {
      resolve({ ok: code === 0, stdout: stdout.trimEnd(), stderr: stderr.trimEnd(), code });
    });

    // EPIPE when the child exits before reading its input; the exit code decides ok
    child.stdin.on('error', (err) => {
      stderr += `stdin: ${err.message}\n`;
    });
    if (typeof input === 'string') {
      child.stdin.write(input);
    }
    child.stdin.end();
  });
}
