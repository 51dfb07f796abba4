/**
 * Crontab Registration
 * Layer: infra
 *
 * Provided ports:
 *   - crontab.schedule
 *   - crontab.entry
 *   - crontab.merge
 *   - crontab.sync
 *
 * Installs the periodic job inside a tagged block of the user's crontab.
 * Lines outside the block are left alone; the block itself is rebuilt on
 * every sync, so registering twice never produces duplicate entries.
 */

import type { RegisterConfig } from './types';
import { runCommand } from './run-command';

export const MANAGED_BLOCK_START = '# container-supervisor begin';
export const MANAGED_BLOCK_END = '# container-supervisor end';

const SCHEDULE_KEYWORDS = new Set([
  '@reboot',
  '@yearly',
  '@annually',
  '@monthly',
  '@weekly',
  '@daily',
  '@midnight',
  '@hourly',
]);

// -----------------------------------------------------------------------------
// Port: crontab.schedule
// -----------------------------------------------------------------------------

export type CrontabScheduleResult = { ok: true; expr: string } | { ok: false; error: string };

/**
 * Validates a crontab schedule: an `@` keyword or a 5-field expression.
 */
export function resolveCrontabSchedule(raw: string): CrontabScheduleResult {
  const expr = raw.trim();
  if (!expr) {
    return { ok: false, error: 'cron schedule is required' };
  }

  if (expr.startsWith('@')) {
    const keyword = expr.toLowerCase();
    if (!SCHEDULE_KEYWORDS.has(keyword)) {
      return { ok: false, error: `unknown schedule keyword: ${expr}` };
    }
    return { ok: true, expr: keyword };
  }

  const parts = expr.split(/\s+/);
  if (parts.length === 6) {
    return { ok: false, error: 'crontab does not support 6-field cron (seconds)' };
  }
  if (parts.length !== 5) {
    return { ok: false, error: 'crontab requires a 5-field cron expression' };
  }
  if (parts.some((part) => !/^[\w*/,-]+$/.test(part))) {
    return { ok: false, error: `invalid cron expression: ${expr}` };
  }
  return { ok: true, expr: parts.join(' ') };
}

// -----------------------------------------------------------------------------
// Port: crontab.entry
// -----------------------------------------------------------------------------

/**
 * Builds the crontab line for a job.
 * Throws if the schedule is invalid or the command spans several lines.
 */
export function buildCrontabEntry(job: RegisterConfig): string {
  const schedule = resolveCrontabSchedule(job.schedule);
  if (!schedule.ok) {
    throw new Error(schedule.error);
  }

  const command = job.command.trim();
  if (!command) {
    throw new Error('job command is required');
  }
  if (/[\r\n]/.test(command)) {
    throw new Error('job command must be a single line');
  }

  const redirect = job.captureOutput ? ` >> ${quoteCrontabWord(job.logPath)} 2>&1` : '';
  return `${schedule.expr} ${command}${redirect}`;
}

/**
 * Quotes a word for the shell cron runs the line with. `%` is escaped
 * separately: cron turns a bare `%` into a newline before the shell sees it.
 */
export function quoteCrontabWord(word: string): string {
  const quoted = /^[\w./-]+$/.test(word) ? word : `'${word.replace(/'/g, "'\\''")}'`;
  return quoted.replace(/%/g, '\\%');
}

// -----------------------------------------------------------------------------
// Port: crontab.merge
// -----------------------------------------------------------------------------

function stripManagedBlock(lines: string[]): string[] {
  const startIndex = lines.findIndex((line) => line.trim() === MANAGED_BLOCK_START);
  if (startIndex === -1) {
    return lines.slice();
  }
  const endIndex = lines.findIndex(
    (line, idx) => idx > startIndex && line.trim() === MANAGED_BLOCK_END,
  );
  if (endIndex === -1) {
    return lines.slice(0, startIndex);
  }
  return [...lines.slice(0, startIndex), ...lines.slice(endIndex + 1)];
}

function trimBlankLines(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start]?.trim() === '') {
    start++;
  }
  while (end > start && lines[end - 1]?.trim() === '') {
    end--;
  }
  return lines.slice(start, end);
}

/**
 * Replaces the managed block in an existing crontab with one holding
 * `entries`. Unmanaged lines keep their order and inner blank lines; only
 * leading and trailing blank lines are dropped. The result always ends with
 * a newline, which cron requires of the last entry.
 */
export function mergeManagedBlock(existing: string, entries: string[]): string {
  const unmanaged = trimBlankLines(stripManagedBlock(existing.split('\n')));
  const block = [MANAGED_BLOCK_START, ...entries, MANAGED_BLOCK_END];
  const lines = unmanaged.length > 0 ? [...unmanaged, '', ...block] : block;
  return `${lines.join('\n')}\n`;
}

// -----------------------------------------------------------------------------
// Port: crontab.sync
// -----------------------------------------------------------------------------

/**
 * Reads the current user's crontab; a user without one yields ''.
 */
export async function readCrontab(): Promise<string> {
  const result = await runCommand('crontab', ['-l']);
  if (result.ok) {
    return result.stdout;
  }
  if (result.stderr.toLowerCase().includes('no crontab')) {
    return '';
  }
  throw new Error(`crontab -l failed: ${result.stderr || 'unknown error'}`);
}

/**
 * Writes `entries` into the managed block of the current user's crontab.
 */
export async function syncCrontab(entries: string[]): Promise<string> {
  const content = mergeManagedBlock(await readCrontab(), entries);
  const writeResult = await runCommand('crontab', ['-'], content);
  if (!writeResult.ok) {
    throw new Error(`crontab - failed: ${writeResult.stderr || 'unknown error'}`);
  }
  return content;
}
