import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';

const DAY_MS = 24 * 60 * 60 * 1000;

function dateStamp(d: Date): string {
  return d.toISOString().slice(0, 10);
}

function readEntries(file: string): Array<Record<string, unknown>> {
  return fs
    .readFileSync(file, 'utf8')
    .trim()
    .split('\n')
    .map((line) => JSON.parse(line));
}

describe('logger module', () => {
  let dir: string;
  let loggerModule: typeof import('../logger.js');
  let savedHome: string | undefined;
  let savedNodeEnv: string | undefined;

  beforeEach(async () => {
    vi.resetModules();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'netglass-logs-'));
    savedHome = process.env.NETGLASS_HOME;
    savedNodeEnv = process.env.NODE_ENV;
    loggerModule = await import('../logger.js');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
    if (savedHome === undefined) delete process.env.NETGLASS_HOME;
    else process.env.NETGLASS_HOME = savedHome;
    if (savedNodeEnv === undefined) delete process.env.NODE_ENV;
    else process.env.NODE_ENV = savedNodeEnv;
  });

  describe('before initLogger', () => {
    it('logs to the console only', () => {
      expect(() => loggerModule.logger.info('test message')).not.toThrow();
      expect(loggerModule.getLogDir()).toBeUndefined();
      expect(loggerModule.logger.level).toBe(3);
    });
  });

  describe('initLogger', () => {
    it('creates an explicit log directory', () => {
      const logDir = path.join(dir, 'nested', 'logs');
      loggerModule.initLogger({ logDir });

      expect(fs.existsSync(logDir)).toBe(true);
      expect(loggerModule.getLogDir()).toBe(logDir);
    });

    it('falls back to NETGLASS_HOME/logs', () => {
      process.env.NETGLASS_HOME = dir;
      loggerModule.initLogger();
      expect(loggerModule.getLogDir()).toBe(path.join(dir, 'logs'));
    });

    it('uses the level from options', () => {
      loggerModule.initLogger({ level: 5, logDir: dir });
      expect(loggerModule.logger.level).toBe(5);
    });

    it('defaults to debug outside production and info in production', () => {
      process.env.NODE_ENV = 'development';
      loggerModule.initLogger({ logDir: dir });
      expect(loggerModule.logger.level).toBe(4);

      process.env.NODE_ENV = 'production';
      loggerModule.initLogger({ logDir: dir });
      expect(loggerModule.logger.level).toBe(3);
    });
  });

  describe('file reporter', () => {
    it('writes one NDJSON object per line', () => {
      loggerModule.initLogger({ level: 5, logDir: dir });
      loggerModule.logger.info('hello world');
      loggerModule.logger.warn('second entry');

      const entries = readEntries(path.join(dir, 'netglass.log'));
      expect(entries).toHaveLength(2);
      expect(entries[0]).toMatchObject({ level: 'info', msg: 'hello world' });
      expect(entries[1]).toMatchObject({ level: 'warn', msg: 'second entry' });
      const time = String(entries[0]?.time);
      expect(new Date(time).toISOString()).toBe(time);
    });

    it('merges object arguments into the entry as context', () => {
      loggerModule.initLogger({ level: 5, logDir: dir });
      loggerModule.logger.warn('remote API unavailable', { code: 'REMOTE_UNAUTHORIZED' });

      const [entry] = readEntries(path.join(dir, 'netglass.log'));
      expect(entry).toMatchObject({ msg: 'remote API unavailable', code: 'REMOTE_UNAUTHORIZED' });
    });

    it('records the tag of a tagged logger', () => {
      loggerModule.initLogger({ level: 5, logDir: dir });
      loggerModule.createTaggedLogger('Refresher').info('background refresh every 4s');

      const [entry] = readEntries(path.join(dir, 'netglass.log'));
      expect(entry?.tag).toBe('Refresher');
      expect(entry?.msg).toBe('background refresh every 4s');
    });
  });

  describe('rotation', () => {
    function writeCurrent(content: string, mtime?: Date): string {
      const file = path.join(dir, 'netglass.log');
      fs.writeFileSync(file, content);
      if (mtime) fs.utimesSync(file, mtime, mtime);
      return file;
    }

    it('renames a file from a previous day to its date', () => {
      const old = new Date(Date.now() - 2 * DAY_MS);
      writeCurrent('{}\n', old);

      loggerModule.initLogger({ logDir: dir });

      expect(fs.existsSync(path.join(dir, `netglass.${dateStamp(old)}.log`))).toBe(true);
      expect(fs.existsSync(path.join(dir, 'netglass.log'))).toBe(false);
    });

    it('adds a sequence number when the dated file exists', () => {
      const old = new Date(Date.now() - 2 * DAY_MS);
      fs.writeFileSync(path.join(dir, `netglass.${dateStamp(old)}.log`), '{}\n');
      writeCurrent('{}\n', old);

      loggerModule.initLogger({ logDir: dir });

      expect(fs.existsSync(path.join(dir, `netglass.${dateStamp(old)}.1.log`))).toBe(true);
    });

    it('rotates an oversized file from today', () => {
      writeCurrent('x'.repeat(2048));

      loggerModule.initLogger({ logDir: dir, maxLogSize: 1024 });

      expect(fs.existsSync(path.join(dir, `netglass.${dateStamp(new Date())}.1.log`))).toBe(true);
    });

    it('leaves a small file from today alone', () => {
      writeCurrent('x'.repeat(100));

      loggerModule.initLogger({ logDir: dir, maxLogSize: 1024 });

      expect(fs.readdirSync(dir)).toEqual(['netglass.log']);
    });

    it('keeps logging when the directory cannot be listed', () => {
      const old = new Date(Date.now() - 2 * DAY_MS);
      fs.writeFileSync(path.join(dir, `netglass.${dateStamp(old)}.log`), '{}\n');
      writeCurrent('{}\n', old);
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      vi.spyOn(fs, 'readdirSync').mockImplementation(() => {
        throw new Error('EIO: i/o error, scandir');
      });

      expect(() => loggerModule.initLogger({ logDir: dir })).not.toThrow();

      expect(warn).toHaveBeenCalledWith('log rotation failed: EIO: i/o error, scandir');
      expect(fs.existsSync(path.join(dir, 'netglass.log'))).toBe(true);
      expect(loggerModule.getLogDir()).toBe(dir);
    });

    it('prunes rotated files beyond maxLogFiles', () => {
      for (let day = 1; day <= 16; day++) {
        fs.writeFileSync(path.join(dir, `netglass.2026-01-${String(day).padStart(2, '0')}.log`), '{}\n');
      }
      writeCurrent('{}\n', new Date(Date.now() - 2 * DAY_MS));

      loggerModule.initLogger({ logDir: dir, maxLogFiles: 14 });

      const rotated = fs.readdirSync(dir).filter((f) => f !== 'netglass.log');
      expect(rotated).toHaveLength(14);
      expect(rotated).not.toContain('netglass.2026-01-01.log');
    });
  });

  describe('logError', () => {
    it('extracts message and stack from Error instances', () => {
      const result = loggerModule.logError(new Error('test error'));
      expect(result.error).toBe('test error');
      expect(result.stack).toBeDefined();
    });

    it('converts non-Error values to string', () => {
      expect(loggerModule.logError('string error')).toEqual({ error: 'string error' });
      expect(loggerModule.logError(42)).toEqual({ error: '42' });
      expect(loggerModule.logError(null)).toEqual({ error: 'null' });
    });
  });
});
