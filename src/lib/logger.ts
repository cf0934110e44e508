/**
 * consola logger for czm.
 *
 * Two reporters are attached by configureLogger():
 * - stderr: warnings and errors always, everything else only with --verbose
 * - the audit log under the state directory, rotated by size, which also
 *   gets one SESSION line per invocation when the process exits
 *
 * Level, highest priority first: --quiet, --verbose, CZM_LOG_LEVEL,
 * logging.level from the config file, info.
 */

import fs from 'fs';
import path from 'path';
import { createConsola } from 'consola';
import type { ConsolaReporter, LogObject } from 'consola';
import { LOG_LEVEL_ENV_VAR, MAX_LOG_FILE_SIZE, MAX_LOG_FILES, getStateDir } from './constants.js';
import { setColorEnabled, style, type Style } from './colors.js';

const INFO_LEVEL = 3;
const DEBUG_LEVEL = 4;

const LEVELS_BY_NAME = new Map<string, number>([
  ['silent', -999],
  ['error', 0],
  ['warn', 1],
  ['warning', 1],
  ['info', INFO_LEVEL],
  ['debug', DEBUG_LEVEL],
  ['verbose', DEBUG_LEVEL],
  ['trace', 5],
]);

const LABELS = ['ERROR', 'WARN', 'LOG', 'INFO', 'DEBUG'];

/**
 * consola level for a name from CZM_LOG_LEVEL or the config file
 */
export function parseLogLevel(value: string): number | undefined {
  return LEVELS_BY_NAME.get(value.trim().toLowerCase());
}

function labelFor(level: number): string {
  if (level < 0) return 'SILENT';
  return LABELS[level] ?? 'TRACE';
}

function labelStyle(level: number): Style {
  if (level <= 0) return 'red';
  if (level === 1) return 'yellow';
  return level <= INFO_LEVEL ? 'cyan' : 'dim';
}

export function formatLogArgs(args: unknown[]): string {
  return args
    .map((arg) => {
      if (arg instanceof Error) return arg.message;
      if (typeof arg === 'object' && arg !== null) return JSON.stringify(arg);
      return String(arg);
    })
    .join(' ');
}

function tagOf(entry: LogObject): string {
  return entry.tag ? ` [${entry.tag}]` : '';
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

let auditProblemReported = false;

// the audit log is best effort; say so once, then keep going
function reportAuditProblem(message: string): void {
  if (auditProblemReported) return;
  auditProblemReported = true;
  process.stderr.write(`[czm] audit log: ${message}\n`);
}

// ---------------------------------------------------------------------------
// Reporters
// ---------------------------------------------------------------------------

class StderrReporter implements ConsolaReporter {
  constructor(private readonly verbose: boolean) {}

  log(entry: LogObject): void {
    if (entry.level > 1 && !this.verbose) return;
    const label = style(`[${labelFor(entry.level)}]`, labelStyle(entry.level));
    process.stderr.write(`${label}${tagOf(entry)} ${formatLogArgs(entry.args)}\n`);
  }
}

class AuditLog implements ConsolaReporter {
  private stream: fs.WriteStream | null = null;

  constructor(readonly filePath: string) {
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      rotateIfNeeded(filePath);
      this.stream = fs.createWriteStream(filePath, { flags: 'a' });
      this.stream.on('error', (err) => {
        reportAuditProblem(`cannot write ${filePath}: ${err.message}`);
        this.stream = null;
      });
    } catch (err) {
      reportAuditProblem(`cannot open ${filePath}: ${messageOf(err)}`);
    }
  }

  log(entry: LogObject): void {
    this.stream?.write(
      `[${new Date().toISOString()}] ${labelFor(entry.level)}${tagOf(entry)} ${formatLogArgs(entry.args)}\n`
    );
  }

  /**
   * Synchronous, for the 'exit' handler
   */
  appendNow(line: string): void {
    try {
      fs.appendFileSync(this.filePath, `${line}\n`);
    } catch (err) {
      reportAuditProblem(`cannot write ${this.filePath}: ${messageOf(err)}`);
    }
  }

  close(): void {
    const stream = this.stream;
    if (!stream) return;
    this.stream = null;
    stream.end();
  }
}

/**
 * Shift audit.log to audit.log.1 and so on once it passes maxSize,
 * dropping the oldest so at most MAX_LOG_FILES remain
 */
export function rotateIfNeeded(filePath: string, maxSize: number = MAX_LOG_FILE_SIZE): void {
  try {
    if (!fs.existsSync(filePath) || fs.statSync(filePath).size <= maxSize) return;
    fs.rmSync(`${filePath}.${MAX_LOG_FILES - 1}`, { force: true });
    for (let n = MAX_LOG_FILES - 2; n >= 0; n--) {
      const from = n === 0 ? filePath : `${filePath}.${n}`;
      if (fs.existsSync(from)) {
        fs.renameSync(from, `${filePath}.${n + 1}`);
      }
    }
  } catch (err) {
    reportAuditProblem(`rotating ${filePath} failed: ${messageOf(err)}`);
  }
}

// ---------------------------------------------------------------------------
// Logger
// ---------------------------------------------------------------------------

/**
 * Silent until configureLogger() attaches reporters
 */
export const logger = createConsola({ level: INFO_LEVEL, reporters: [] });

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  noColor?: boolean;
  /** logging.level from the config file */
  configLevel?: string;
  commandName?: string;
  /** Audit log location; null disables it */
  auditFile?: string | null;
}

interface Invocation {
  command: string;
  cwd: string;
  startedAt: number;
  targets: string[];
}

let invocation: Invocation | null = null;
let auditLog: AuditLog | null = null;
let exitHookInstalled = false;

function resolveLevel(options: LoggerOptions): number {
  if (options.quiet) return 0;
  if (options.verbose) return DEBUG_LEVEL;
  const candidates = [process.env[LOG_LEVEL_ENV_VAR], options.configLevel];
  for (const candidate of candidates) {
    const level = candidate ? parseLogLevel(candidate) : undefined;
    if (level !== undefined) return level;
  }
  return INFO_LEVEL;
}

/**
 * Append the SESSION line for the current invocation. Runs from the
 * process 'exit' hook.
 */
export function finishSession(exitCode: number): void {
  if (!invocation || !auditLog) return;
  const { command, cwd, startedAt, targets } = invocation;
  const fields = [
    `command=${command}`,
    `cwd=${cwd}`,
    ...(targets.length > 0 ? [`targets=${targets.join(' ')}`] : []),
    `exit=${exitCode}`,
    `duration=${Date.now() - startedAt}ms`,
  ];
  auditLog.appendNow(`[${new Date().toISOString()}] SESSION ${fields.join(' ')}`);
}

/**
 * Set level and reporters. Calling it again replaces both.
 */
export function configureLogger(options: LoggerOptions = {}): void {
  logger.level = resolveLevel(options);
  if (options.noColor) {
    setColorEnabled(false);
  }

  auditLog?.close();
  const auditPath =
    options.auditFile === undefined ? path.join(getStateDir(), 'audit.log') : options.auditFile;
  auditLog = auditPath ? new AuditLog(auditPath) : null;

  const stderr = new StderrReporter(options.verbose ?? false);
  logger.setReporters(auditLog ? [auditLog, stderr] : [stderr]);

  if (options.commandName) {
    invocation = {
      command: options.commandName,
      cwd: process.cwd(),
      startedAt: Date.now(),
      targets: [],
    };
  }

  if (!exitHookInstalled) {
    exitHookInstalled = true;
    process.on('exit', finishSession);
  }
}

/**
 * Targets the current invocation acted on, for its SESSION line
 */
export function recordTargets(targets: readonly string[]): void {
  if (invocation) {
    invocation.targets = [...targets];
  }
}

export function resetLoggerForTests(): void {
  invocation = null;
  auditProblemReported = false;
  auditLog?.close();
  auditLog = null;
  logger.setReporters([]);
  logger.level = INFO_LEVEL;
}
