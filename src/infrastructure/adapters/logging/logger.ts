// Shared logging utilities for the harness
// All modules should import from this file instead of defining their own

export type LogLevel = 'verbose' | 'info' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['verbose', 'info', 'silent'];

let configuredLevel: LogLevel | undefined;

/**
 * Fix the level for the whole process; undefined falls back to HARNESS_LOG_LEVEL
 */
export function setLogLevel(level: LogLevel | undefined): void {
  configuredLevel = level;
}

export function currentLevel(): LogLevel {
  if (configuredLevel) {
    return configuredLevel;
  }
  const raw = process.env.HARNESS_LOG_LEVEL;
  return LOG_LEVELS.find(level => level === raw) ?? 'verbose';
}

function writeLine(line: string): void {
  process.stdout.write(line + '\n');
}

function writeErrorLine(line: string): void {
  process.stderr.write(line + '\n');
}

export function log(module: string, message: string, ...args: unknown[]): void {
  if (currentLevel() === 'silent') return;
  const timestamp = new Date().toISOString();
  const argsStr = args.length > 0 ? ' ' + JSON.stringify(args) : '';
  writeLine(`[${timestamp}] [${module}] ${message}${argsStr}`);
}

export function logVerbose(component: string, message: string, data?: Record<string, unknown>): void {
  if (currentLevel() !== 'verbose') return;
  const timestamp = new Date().toISOString();
  const dataStr = data ? ` | Data: ${JSON.stringify(data)}` : '';
  writeLine(`[${timestamp}] [VERBOSE] [${component}] ${message}${dataStr}`);
}

export function logPerformance(operation: string, duration: number, metadata?: Record<string, unknown>): void {
  if (currentLevel() !== 'verbose') return;
  const timestamp = new Date().toISOString();
  const metadataStr = metadata ? ` | Metadata: ${JSON.stringify(metadata)}` : '';
  writeLine(`[${timestamp}] [PERFORMANCE] ${operation} took ${duration}ms${metadataStr}`);
}

export function logStateTransition(from: string, to: string, context?: Record<string, unknown>): void {
  if (currentLevel() === 'silent') return;
  const timestamp = new Date().toISOString();
  const contextStr = context ? ` | Context: ${JSON.stringify(context)}` : '';
  writeLine(`[${timestamp}] [STATE_TRANSITION] ${from} -> ${to}${contextStr}`);
}

export function logError(module: string, message: string, error?: unknown): void {
  const timestamp = new Date().toISOString();
  const errorStr = error instanceof Error ? ` | Error: ${error.message}` : error ? ` | Error: ${JSON.stringify(error)}` : '';
  writeErrorLine(`[${timestamp}] [ERROR] [${module}] ${message}${errorStr}`);
}
