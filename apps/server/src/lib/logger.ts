import { createConsola, type ConsolaInstance, type LogObject } from 'consola';
import fs from 'fs';
import path from 'path';
import os from 'os';

/**
 * Central logger for the netglass server.
 *
 * A consola singleton. Until `initLogger()` runs it writes to the console at
 * info level. Afterwards it also appends NDJSON entries to
 * `{NETGLASS_HOME}/logs/netglass.log`, rotated by day and by size.
 *
 * The overlay core never imports this module; it receives tagged instances
 * through its `Logger` interface.
 *
 * @module lib/logger
 */

const LOG_BASENAME = 'netglass';
const DEFAULT_MAX_LOG_SIZE = 500 * 1024;
const DEFAULT_MAX_LOG_FILES = 14;

let logDir: string | undefined;
let logFile: string | undefined;
let maxLogSize = DEFAULT_MAX_LOG_SIZE;
let maxLogFiles = DEFAULT_MAX_LOG_FILES;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

/** NDJSON reporter: one `{level,time,msg,tag,...context}` object per line. */
function createFileReporter() {
  return {
    log(logObj: LogObject) {
      if (!logFile) return;

      // Plain objects are merged as context; everything else joins the message
      let context: Record<string, unknown> = {};
      const msgParts: string[] = [];
      for (const arg of logObj.args) {
        if (isRecord(arg)) {
          context = { ...context, ...arg };
        } else if (arg instanceof Error) {
          msgParts.push(arg.message);
        } else {
          msgParts.push(String(arg));
        }
      }

      const entry = JSON.stringify({
        level: logObj.type,
        time: logObj.date.toISOString(),
        msg: msgParts.join(' '),
        tag: logObj.tag || undefined,
        ...context,
      });
      fs.appendFileSync(logFile, entry + '\n');
    },
  };
}

function formatDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/**
 * Rotate `netglass.log` when it is from a previous day (to
 * `netglass.YYYY-MM-DD.log`) or larger than `maxLogSize` (to
 * `netglass.YYYY-MM-DD.N.log`), then prune beyond `maxLogFiles`.
 *
 * A missing file or any failure while rotating leaves logging to continue as-is.
 */
function rotateIfNeeded(): void {
  if (!logDir || !logFile) return;

  let stat: fs.Stats;
  try {
    stat = fs.statSync(logFile);
  } catch {
    return;
  }

  const today = formatDate(new Date());
  const fileDate = formatDate(stat.mtime);

  try {
    let target: string | null = null;
    if (fileDate !== today) {
      const dated = path.join(logDir, `${LOG_BASENAME}.${fileDate}.log`);
      target = fs.existsSync(dated)
        ? path.join(logDir, `${LOG_BASENAME}.${fileDate}.${nextSequenceNumber(fileDate)}.log`)
        : dated;
    } else if (stat.size > maxLogSize) {
      target = path.join(logDir, `${LOG_BASENAME}.${today}.${nextSequenceNumber(today)}.log`);
    }

    if (!target) return;
    fs.renameSync(logFile, target);
    cleanupOldFiles();
  } catch (err) {
    console.warn(`log rotation failed: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function nextSequenceNumber(date: string): number {
  if (!logDir) return 1;
  const pattern = new RegExp(`^${LOG_BASENAME}\\.${date}\\.(\\d+)\\.log$`);
  let max = 0;
  for (const f of fs.readdirSync(logDir)) {
    const m = pattern.exec(f);
    if (m?.[1]) max = Math.max(max, parseInt(m[1], 10));
  }
  return max + 1;
}

function cleanupOldFiles(): void {
  if (!logDir) return;
  const rotated = new RegExp(`^${LOG_BASENAME}\\.\\d{4}-\\d{2}-\\d{2}(\\.\\d+)?\\.log$`);
  const files = fs
    .readdirSync(logDir)
    .filter((f) => rotated.test(f))
    .sort()
    .reverse();
  for (const old of files.slice(maxLogFiles)) {
    fs.unlinkSync(path.join(logDir, old));
  }
}

/** Default logger instance (console-only until initLogger is called). */
export let logger: ConsolaInstance = createConsola({
  level: 3,
});

/**
 * Enable file persistence and set the level. Call once at startup after the
 * config is loaded.
 *
 * @param options.level - Numeric consola level (0=fatal … 5=trace). Defaults to 4 outside production, 3 in production.
 * @param options.logDir - Defaults to `{NETGLASS_HOME}/logs`.
 * @param options.maxLogSize - Bytes before size rotation.
 * @param options.maxLogFiles - Rotated files kept.
 */
export function initLogger(options?: {
  level?: number;
  logDir?: string;
  maxLogSize?: number;
  maxLogFiles?: number;
}): void {
  logDir =
    options?.logDir ??
    path.join(process.env.NETGLASS_HOME ?? path.join(os.homedir(), '.netglass'), 'logs');
  logFile = path.join(logDir, `${LOG_BASENAME}.log`);
  maxLogSize = options?.maxLogSize ?? DEFAULT_MAX_LOG_SIZE;
  maxLogFiles = options?.maxLogFiles ?? DEFAULT_MAX_LOG_FILES;

  fs.mkdirSync(logDir, { recursive: true });
  rotateIfNeeded();

  const level = options?.level ?? (process.env.NODE_ENV === 'production' ? 3 : 4);

  logger = createConsola({ level });
  logger.addReporter(createFileReporter());
}

/** Resolved log directory, or undefined before initLogger. */
export function getLogDir(): string | undefined {
  return logDir;
}

/** Child logger whose NDJSON entries carry `tag`. */
export function createTaggedLogger(tag: string): ConsolaInstance {
  return logger.withTag(tag);
}

/** Extract structured error fields for consistent NDJSON logging. */
export function logError(err: unknown): { error: string; stack?: string } {
  if (err instanceof Error) return { error: err.message, stack: err.stack };
  return { error: String(err) };
}
