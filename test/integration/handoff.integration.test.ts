/**
 * Integration tests for the primary command handoff.
 *
 * These tests spawn real Node.js processes to verify argv pass-through,
 * exit status propagation and signal relaying end to end. The scheduler
 * cases put stand-in `cron` and `service` scripts first on PATH.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';

vi.mock('@actions/core');

import { handoff } from '../../src/handoff';
import type { SignalDeps } from '../../src/handoff';
import { main } from '../../src/main';

const node = process.execPath;

function writeScript(dir: string, name: string, source: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, source);
  return file;
}

async function waitForFile(file: string, timeoutMs: number): Promise<void> {
  const start = Date.now();
  while (!fs.existsSync(file)) {
    if (Date.now() - start > timeoutMs) {
      throw new Error(`Timed out waiting for ${file}`);
    }
    await new Promise((resolve) => setTimeout(resolve, 25));
  }
}

describe('handoff (real processes)', () => {
  let testDir: string;
  let errorSpy: MockInstance;

  beforeEach((): void => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'handoff-integration-'));
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach((): void => {
    vi.restoreAllMocks();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('delivers the argument vector byte-for-byte', async (): Promise<void> => {
    const out = path.join(testDir, 'argv.json');
    const script = writeScript(
      testDir,
      'argv.js',
      `require('fs').writeFileSync(${JSON.stringify(out)}, JSON.stringify(process.argv.slice(2)));`,
    );
    const args = ['run', 'app.py', 'two words', '', "it's", '$HOME', '--flag=a b', 'ünïcode'];

    const result = await handoff([node, script, ...args]);

    expect(result).toEqual({ exitCode: 0, signal: null });
    expect(JSON.parse(fs.readFileSync(out, 'utf-8'))).toEqual(args);
  });

  it('propagates the exit code unchanged', async (): Promise<void> => {
    const result = await handoff([node, '-e', 'process.exit(7)']);

    expect(result).toEqual({ exitCode: 7, signal: null });
  });

  it('maps death by signal to 128 + signal number', async (): Promise<void> => {
    const result = await handoff([node, '-e', "process.kill(process.pid, 'SIGKILL')"]);

    expect(result).toEqual({ exitCode: 128 + os.constants.signals.SIGKILL, signal: 'SIGKILL' });
  });

  it('returns 127 for a command that does not exist', async (): Promise<void> => {
    const result = await handoff(['container-supervisor-no-such-command', 'arg']);

    expect(result.exitCode).toBe(127);
    expect(result.signal).toBeNull();
    expect(errorSpy).toHaveBeenCalledWith(
      'container-supervisor-no-such-command: spawn container-supervisor-no-such-command ENOENT',
    );
  });

  it('returns 126 for a file without execute permission', async (): Promise<void> => {
    const file = writeScript(testDir, 'not-executable.sh', '#!/bin/sh\nexit 0\n');
    fs.chmodSync(file, 0o644);

    const result = await handoff([file]);

    expect(result.exitCode).toBe(126);
  });

  it('runs nothing for an empty command', async (): Promise<void> => {
    expect(await handoff([])).toEqual({ exitCode: 0, signal: null });
  });

  it('relays a forwarded signal to the running command', async (): Promise<void> => {
    const ready = path.join(testDir, 'ready');
    const script = writeScript(
      testDir,
      'trap.js',
      [
        "process.on('SIGTERM', () => process.exit(42));",
        `require('fs').writeFileSync(${JSON.stringify(ready)}, '');`,
        'setInterval(() => {}, 1000);',
      ].join('\n'),
    );

    const handlers = new Map<NodeJS.Signals, () => void>();
    const signalDeps: SignalDeps = {
      registerSignal: (signal, handler) => {
        handlers.set(signal, handler);
      },
      unregisterSignal: (signal) => {
        handlers.delete(signal);
      },
    };

    const pending = handoff([node, script], { signals: ['SIGTERM'], signalDeps });
    await waitForFile(ready, 5000);
    handlers.get('SIGTERM')?.();
    const result = await pending;

    expect(result).toEqual({ exitCode: 42, signal: null });
    expect(handlers.size).toBe(0);
  });

  // The child exits with the number of SIGINTs seen in a short window.
  function writeSigintCounter(ready: string): string {
    return writeScript(
      testDir,
      'count-sigint.js',
      [
        "const fs = require('fs');",
        'let count = 0;',
        "process.on('SIGINT', () => {",
        '  count += 1;',
        '  if (count === 1) setTimeout(() => process.exit(count), 300);',
        '});',
        `fs.writeFileSync(${JSON.stringify(ready + '.tmp')}, String(process.pid));`,
        `fs.renameSync(${JSON.stringify(ready + '.tmp')}, ${JSON.stringify(ready)});`,
        'setInterval(() => {}, 1000);',
      ].join('\n'),
    );
  }

  function recordingSignalDeps(handlers: Map<NodeJS.Signals, () => void>): SignalDeps {
    return {
      registerSignal: (signal, handler) => {
        handlers.set(signal, handler);
      },
      unregisterSignal: (signal) => {
        handlers.delete(signal);
      },
    };
  }

  it('delivers a terminal Ctrl-C exactly once', async (): Promise<void> => {
    const ready = path.join(testDir, 'pid');
    const script = writeSigintCounter(ready);
    const handlers = new Map<NodeJS.Signals, () => void>();

    const pending = handoff([node, script], {
      interactive: true,
      signalDeps: recordingSignalDeps(handlers),
    });
    await waitForFile(ready, 5000);

    expect(handlers.has('SIGINT')).toBe(false);
    expect(handlers.has('SIGTERM')).toBe(true);

    // The terminal signals the whole foreground group: the child directly,
    // and the supervisor, which has no SIGINT relay installed.
    process.kill(Number(fs.readFileSync(ready, 'utf-8')), 'SIGINT');
    handlers.get('SIGINT')?.();

    expect(await pending).toEqual({ exitCode: 1, signal: null });
  });

  it('relays SIGINT once when only the supervisor receives it', async (): Promise<void> => {
    const ready = path.join(testDir, 'pid');
    const script = writeSigintCounter(ready);
    const handlers = new Map<NodeJS.Signals, () => void>();

    const pending = handoff([node, script], {
      interactive: false,
      signalDeps: recordingSignalDeps(handlers),
    });
    await waitForFile(ready, 5000);
    handlers.get('SIGINT')?.();

    expect(await pending).toEqual({ exitCode: 1, signal: null });
  });
});

describe('main (real processes)', () => {
  let testDir: string;

  beforeEach((): void => {
    testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'main-integration-'));
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach((): void => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  function installFakes(serviceScript: string): void {
    const cron = writeScript(testDir, 'cron', '#!/bin/sh\nexit 0\n');
    const service = writeScript(testDir, 'service', serviceScript);
    fs.chmodSync(cron, 0o755);
    fs.chmodSync(service, 0o755);
    vi.stubEnv('PATH', `${testDir}${path.delimiter}${process.env['PATH'] ?? ''}`);
  }

  it('hands off when the scheduler binary is absent', async (): Promise<void> => {
    const exitCode = await main([node, '-e', 'process.exit(4)'], {
      SUPERVISOR_SCHEDULER_BINARY: 'container-supervisor-test-cron',
    });

    expect(exitCode).toBe(4);
  });

  it('never runs the command when a strict scheduler start fails', async (): Promise<void> => {
    installFakes('#!/bin/sh\necho "$1: unrecognized service" >&2\nexit 1\n');
    const marker = path.join(testDir, 'ran');

    const exitCode = await main(
      [node, '-e', `require('fs').writeFileSync(${JSON.stringify(marker)}, '')`],
      {
        SUPERVISOR_SCHEDULER_POLICY: 'strict',
        SUPERVISOR_FOLLOW_LOG: 'false',
      },
    );

    expect(exitCode).toBe(69);
    expect(fs.existsSync(marker)).toBe(false);
    expect(console.error).toHaveBeenCalledWith(
      'Failed to start cron scheduler: cron: unrecognized service',
    );
  });

  it('starts the scheduler through service and then hands off', async (): Promise<void> => {
    const started = path.join(testDir, 'started');
    installFakes(`#!/bin/sh\necho "$1 $2" > ${JSON.stringify(started)}\n`);

    const exitCode = await main([node, '-e', 'process.exit(6)'], {
      SUPERVISOR_SCHEDULER_POLICY: 'strict',
      SUPERVISOR_FOLLOW_LOG: 'false',
    });

    expect(exitCode).toBe(6);
    expect(fs.readFileSync(started, 'utf-8')).toBe('cron start\n');
  });

  it('rejects an invalid policy before doing anything', async (): Promise<void> => {
    const exitCode = await main([node, '-e', 'process.exit(0)'], {
      SUPERVISOR_SCHEDULER_POLICY: 'sometimes',
    });

    expect(exitCode).toBe(78);
  });
});
