import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export const LOG_FILE_NAME = 'support-bot.log';
export const HEARTBEAT_FILE_NAME = 'heartbeat.json';
const MAX_LOG_BYTES = 10 * 1024 * 1024;
const HEARTBEAT_INTERVAL_MS = 60_000;

export function parseLogLevel(raw: string | undefined): LogLevel {
  const upper = (raw || '').trim().toUpperCase();
  return LOG_LEVELS.find(level => level === upper) ?? 'INFO';
}

export interface LoggerOptions {
  dir: string;
  level: LogLevel;
  /** A log file larger than this at startup is moved to `<file>.1`. */
  maxLogBytes?: number;
}

export function loggerOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  return {
    dir: env.BOT_LOG_DIR || path.join(env.HOME || os.tmpdir(), '.support-bot-logs'),
    level: parseLogLevel(env.LOG_LEVEL),
  };
}

/** Bot state written into the heartbeat file next to the process fields. */
export type HeartbeatStatus = Record<string, string | number | boolean | null>;

export class Logger {
  readonly level: LogLevel;
  readonly logFile: string;
  readonly heartbeatFile: string;
  private fileSinkEnabled: boolean = true;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private readonly startedAt: number = Date.now();

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.logFile = path.join(options.dir, LOG_FILE_NAME);
    this.heartbeatFile = path.join(options.dir, HEARTBEAT_FILE_NAME);
    this.prepareLogFile(options.dir, options.maxLogBytes ?? MAX_LOG_BYTES);
  }

  private prepareLogFile(dir: string, maxLogBytes: number): void {
    try {
      fs.mkdirSync(dir, { recursive: true });
      // Only one archive is kept
      if (fs.existsSync(this.logFile) && fs.statSync(this.logFile).size > maxLogBytes) {
        fs.renameSync(this.logFile, `${this.logFile}.1`);
      }
    } catch (error) {
      this.disableFileSink(error);
    }
  }

  private disableFileSink(error: unknown): void {
    if (!this.fileSinkEnabled) return;
    this.fileSinkEnabled = false;
    process.stderr.write(`[Logger] File logging disabled: ${String(error)}\n`);
  }

  log(level: LogLevel, source: string, message: string, data?: unknown): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) return;

    const timestamp = new Date().toISOString();
    const logLine = `[${timestamp}] [${level}] [${source}] ${message}${data !== undefined ? ' ' + JSON.stringify(data) : ''}\n`;

    process.stderr.write(logLine);

    if (!this.fileSinkEnabled) return;
    try {
      fs.appendFileSync(this.logFile, logLine);
    } catch (error) {
      this.disableFileSink(error);
    }
  }

  debug(source: string, message: string, data?: unknown): void {
    this.log('DEBUG', source, message, data);
  }

  info(source: string, message: string, data?: unknown): void {
    this.log('INFO', source, message, data);
  }

  warn(source: string, message: string, data?: unknown): void {
    this.log('WARN', source, message, data);
  }

  error(source: string, message: string, data?: unknown): void {
    this.log('ERROR', source, message, data);
  }

  fatal(source: string, message: string, data?: unknown): void {
    this.log('FATAL', source, message, data);
  }

  /**
   * Rewrite the heartbeat file now and then every `intervalMs` until
   * stopHeartbeat. `status` is asked for fresh values on every beat.
   */
  startHeartbeat(status: () => HeartbeatStatus, intervalMs: number = HEARTBEAT_INTERVAL_MS): void {
    this.stopHeartbeat();

    const beat = () => this.writeHeartbeat(status());
    beat();
    this.heartbeatTimer = setInterval(beat, intervalMs);
    this.heartbeatTimer.unref();

    this.debug('Heartbeat', `Writing ${this.heartbeatFile} every ${intervalMs / 1000}s`);
  }

  stopHeartbeat(): void {
    if (!this.heartbeatTimer) return;
    clearInterval(this.heartbeatTimer);
    this.heartbeatTimer = null;
  }

  private writeHeartbeat(status: HeartbeatStatus): void {
    if (!this.fileSinkEnabled) return;

    const heartbeat = {
      pid: process.pid,
      updatedAt: new Date().toISOString(),
      uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000),
      ...status,
    };

    try {
      fs.writeFileSync(this.heartbeatFile, JSON.stringify(heartbeat, null, 2));
    } catch (error) {
      this.disableFileSink(error);
    }
  }
}

export const logger = new Logger(loggerOptionsFromEnv());
