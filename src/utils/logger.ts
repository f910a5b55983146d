import path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  LOG = 'LOG',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: LogLevel[] = [LogLevel.DEBUG, LogLevel.LOG, LogLevel.WARN, LogLevel.ERROR];

type ExtraInformation = Record<string, unknown>;

interface LogEntry {
  fileName: string;
  functionName: string;
  level: LogLevel;
  message: string;
}

/**
 * Minimum level written, from LOG_LEVEL (defaults to LOG)
 */
export function getMinimumLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toUpperCase();
  return LEVEL_ORDER.find((level) => level === configured) ?? LogLevel.LOG;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(getMinimumLevel());
}

type CallerInfo = { fileName: string; functionName: string };

const UNKNOWN_CALLER: CallerInfo = { fileName: 'unknown', functionName: 'unknown' };

// `at name (location:line:col)` or `at location:line:col`
const STACK_FRAME = /^\s*at (?:(.+?) \()?(.+?):\d+:\d+\)?$/;

/**
 * Reads the file and function of one V8 stack trace line
 */
export function parseStackFrame(frame: string): CallerInfo {
  const match = STACK_FRAME.exec(frame);
  if (!match) {
    return UNKNOWN_CALLER;
  }
  const [, qualifiedName, location] = match;
  const functionName = qualifiedName?.replace(/^(async|new) /, '').split('.').pop();
  return {
    fileName: path.basename(location, path.extname(location)),
    functionName: functionName || 'anonymous',
  };
}

/**
 * File and function `depth` frames above this one (1 = our caller)
 */
function getCallerInfo(depth: number): CallerInfo {
  const frames = (new Error().stack ?? '').split('\n').slice(2);
  const frame = frames[depth - 1];
  return frame === undefined ? UNKNOWN_CALLER : parseStackFrame(frame);
}

function isExtraInformation(value: unknown): value is ExtraInformation {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.getPrototypeOf(value) === Object.prototype &&
    Object.keys(value).length > 0
  );
}

export function formatExtraInformation(extraInformation: ExtraInformation): string {
  return Object.entries(extraInformation)
    .map(([key, value]) => `${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join(' | ');
}

/**
 * Builds a log line: `LEVEL | file:function | message | key: value`
 */
export function formatLogEntry(entry: LogEntry, extraInformation?: ExtraInformation): string {
  const parts = [entry.level, `${entry.fileName}:${entry.functionName}`, entry.message];
  if (extraInformation) {
    parts.push(formatExtraInformation(extraInformation));
  }
  return parts.join(' | ');
}

/**
 * Main logging function
 * @param level Log level
 * @param args Message parts, optionally ending with a plain object of extra information
 */
function logMessage(level: LogLevel, ...args: unknown[]): void {
  if (!isEnabled(level)) {
    return;
  }
  const { fileName, functionName } = getCallerInfo(3); // past logMessage and the level helper

  const lastArg = args[args.length - 1];
  const extraInformation = isExtraInformation(lastArg) ? lastArg : undefined;
  const messageParts = extraInformation ? args.slice(0, -1) : args;

  // Join message parts like console.log does
  const message = messageParts
    .map((part) => (typeof part === 'string' ? part : part instanceof Error ? part.message : JSON.stringify(part)))
    .join(' ');

  const fullOutput = formatLogEntry({ fileName, functionName, level, message }, extraInformation);

  switch (level) {
    case LogLevel.DEBUG:
      console.debug(fullOutput);
      break;
    case LogLevel.WARN:
      console.warn(fullOutput);
      break;
    case LogLevel.ERROR:
      console.error(fullOutput);
      break;
    default:
      console.log(fullOutput);
  }
}

/**
 * Debug level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Calculated', scheme, { annualPension: 15625 })
 */
export function debug(...args: unknown[]): void {
  logMessage(LogLevel.DEBUG, ...args);
}

/**
 * Info level logging - accepts multiple message parts like console.log
 */
export function log(...args: unknown[]): void {
  logMessage(LogLevel.LOG, ...args);
}

/**
 * Warning level logging - accepts multiple message parts like console.log
 * @param args Message parts and optional extraInformation (e.g., 'Rejected scenario', { field: 'retirementAge' })
 */
export function warn(...args: unknown[]): void {
  logMessage(LogLevel.WARN, ...args);
}

/**
 * Error level logging - accepts multiple message parts like console.log
 */
export function err(...args: unknown[]): void {
  logMessage(LogLevel.ERROR, ...args);
}
