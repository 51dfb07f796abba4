/**
 * Command Runner Tests
 *
 * Spawns real Node.js children; nothing leaves the process tree.
 */

import { describe, it, expect } from 'vitest';
import { runCommand } from '../src/run-command';

const node = process.execPath;

describe('runCommand', () => {
  it('collects stdout and trims the trailing newline', async (): Promise<void> => {
    const result = await runCommand(node, ['-e', 'console.log("hello")']);

    expect(result).toEqual({ ok: true, stdout: 'hello', stderr: '', code: 0 });
  });

  it('reports a non-zero exit with stderr', async (): Promise<void> => {
    const result = await runCommand(node, ['-e', 'console.error("nope"); process.exit(3)']);

    expect(result).toEqual({ ok: false, stdout: '', stderr: 'nope', code: 3 });
  });

  it('pipes input to stdin', async (): Promise<void> => {
    const script =
      'let s = ""; process.stdin.on("data", (c) => { s += c; }); process.stdin.on("end", () => { process.stdout.write(s.toUpperCase()); });';

    const result = await runCommand(node, ['-e', script], 'line one\nline two\n');

    expect(result.ok).toBe(true);
    expect(result.stdout).toBe('LINE ONE\nLINE TWO');
  });

  it('resolves with ok=false when the command does not exist', async (): Promise<void> => {
    const result = await runCommand('container-supervisor-no-such-command', []);

    expect(result.ok).toBe(false);
    expect(result.code).toBeNull();
    expect(result.stderr).toContain('ENOENT');
  });
});
