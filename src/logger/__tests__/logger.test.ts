import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import ansis from 'ansis';
import { NotifierLogger, logFileName } from '../index.js';
import { mkdtempSync, rmSync, existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

const FIXED_NOW = new Date(2026, 9, 19, 14, 5, 9);

function makeOutput(): { write: (data: string) => boolean; lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    write: (data: string) => {
      lines.push(ansis.strip(data));
      return true;
    },
  };
}

function readLines(file: string): Array<Record<string, unknown>> {
  return readFileSync(file, 'utf-8')
    .trim()
    .split('\n')
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe('logFileName', () => {
  it('uses the local calendar date with zero padding', () => {
    expect(logFileName('resolve_slack_deliver', new Date(2026, 0, 5, 23, 59))).toBe(
      'resolve_slack_deliver_2026-01-05.log',
    );
  });
});

describe('NotifierLogger', () => {
  let logDir: string;
  let output: ReturnType<typeof makeOutput>;
  let logger: NotifierLogger;

  beforeEach(() => {
    logDir = mkdtempSync(join(tmpdir(), 'render-notify-logger-test-'));
    output = makeOutput();
    logger = new NotifierLogger({ directory: logDir, now: () => FIXED_NOW, output });
  });

  afterEach(() => {
    logger.close();
    rmSync(logDir, { recursive: true, force: true });
  });

  it('resolves the file name from the prefix and date', () => {
    expect(logger.filePath).toBe(join(logDir, 'resolve_slack_deliver_2026-10-19.log'));
  });

  it('creates the log directory if it does not exist', () => {
    const nestedDir = join(logDir, 'nested', 'deep');
    const nested = new NotifierLogger({ directory: nestedDir, now: () => FIXED_NOW, output: null });
    expect(existsSync(nestedDir)).toBe(true);
    nested.close();
  });

  it('writes one NDJSON line per entry with the level label', () => {
    logger.log('info', 'config', 'Config loaded');
    logger.log('warn', 'slack', 'Slack delivery failed', { slackError: 'channel_not_found' });

    const lines = readLines(logger.filePath);
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({ level: 'INFO', component: 'config', msg: 'Config loaded' });
    expect(lines[1]).toMatchObject({
      level: 'WARNING',
      component: 'slack',
      msg: 'Slack delivery failed',
      slackError: 'channel_not_found',
    });
    expect(lines[0]!['time']).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it('appends to an existing file instead of truncating it', () => {
    logger.log('info', 'run', 'first run');
    logger.close();

    const second = new NotifierLogger({ directory: logDir, now: () => FIXED_NOW, output: null });
    second.log('info', 'run', 'second run');
    second.close();

    expect(readLines(logger.filePath).map((line) => line['msg'])).toEqual(['first run', 'second run']);
  });

  it('echoes entries to the console output', () => {
    logger.log('error', 'system', 'Desktop notification failed');
    expect(output.lines).toEqual(['[14:05:09] ERROR [system] Desktop notification failed\n']);
  });

  it('keeps entries in memory in order', () => {
    logger.log('info', 'a', 'first');
    logger.log('warn', 'b', 'second', { attempt: 1 });
    logger.log('error', 'c', 'third');

    const entries = logger.getRecentEntries();
    expect(entries.map((e) => e.message)).toEqual(['first', 'second', 'third']);
    expect(entries[1]).toEqual({
      timestamp: FIXED_NOW.toISOString(),
      level: 'warn',
      component: 'b',
      message: 'second',
      meta: { attempt: 1 },
    });
  });

  it('drops entries below the active level', () => {
    logger.log('debug', 'diag', 'hidden');
    expect(logger.getRecentEntries()).toHaveLength(0);
    expect(output.lines).toHaveLength(0);
  });

  it('records debug entries when the level allows them', () => {
    const verbose = new NotifierLogger({
      directory: logDir,
      prefix: 'verbose',
      level: 'debug',
      now: () => FIXED_NOW,
      output: null,
    });
    verbose.log('debug', 'diag', 'node version');
    verbose.close();

    expect(readLines(join(logDir, 'verbose_2026-10-19.log'))[0]).toMatchObject({
      level: 'DEBUG',
      msg: 'node version',
    });
  });

  it('keeps echoing to the console after close()', () => {
    logger.log('info', 'run', 'before close');
    logger.close();
    logger.log('info', 'run', 'after close');

    expect(readLines(logger.filePath).map((line) => line['msg'])).toEqual(['before close']);
    expect(output.lines).toHaveLength(2);
  });

  it('keeps lines whole when two runs append to the same daily file', () => {
    const first = new NotifierLogger({ directory: logDir, now: () => FIXED_NOW, output: null });
    const second = new NotifierLogger({ directory: logDir, now: () => FIXED_NOW, output: null });
    const payload = 'x'.repeat(5 * 1024);

    for (let i = 0; i < 200; i++) {
      first.log('info', 'first', `entry ${i}`, { payload });
      second.log('info', 'second', `entry ${i}`, { payload });
    }
    first.close();
    second.close();

    const lines = readFileSync(join(logDir, 'resolve_slack_deliver_2026-10-19.log'), 'utf-8')
      .trim()
      .split('\n');
    expect(lines).toHaveLength(400);
    const entries = lines.map((line) => JSON.parse(line) as Record<string, unknown>);
    expect(entries.filter((entry) => entry['component'] === 'first')).toHaveLength(200);
    expect(entries.filter((entry) => entry['component'] === 'second')).toHaveLength(200);
    expect(entries.every((entry) => entry['payload'] === payload)).toBe(true);
  });
});
