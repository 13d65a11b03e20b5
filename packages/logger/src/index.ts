/**
 * @exsync/logger
 *
 * Structured logging for the sync engine. Credentials, auth headers and
 * mailbox addresses are scrubbed before anything reaches the output sink.
 */

import { createHash } from 'crypto';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  /** Component/module name */
  component?: string;
  /** Account identity (hashed before output) */
  account?: string;
  /** Protocol command or SOAP action being executed */
  command?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerOptions {
  /** Minimum level to output (default: LOG_LEVEL env, else 'info') */
  minLevel?: LogLevel;
  includeTimestamps?: boolean;
  /** JSON lines instead of the pretty format (default: true when NODE_ENV=production) */
  jsonFormat?: boolean;
  /** Patterns whose matches are replaced before output */
  redactPatterns?: RegExp[];
  redactStackTraces?: boolean;
  baseContext?: LogContext;
  output?: (entry: LogEntry) => void;
}

export interface ILogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error | null, context?: LogContext): void;
  fatal(message: string, error?: Error | null, context?: LogContext): void;

  /** Create a child logger with additional context */
  child(context: LogContext): ILogger;

  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
}

// =============================================================================
// Constants
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

/**
 * Default redaction patterns
 */
export const DEFAULT_REDACT_PATTERNS: RegExp[] = [
  // HTTP auth header values (Basic, NTLM, Negotiate, Bearer)
  /\b(Basic|NTLM|Negotiate|Bearer)\s+[A-Za-z0-9+/=._-]{16,}/g,
  // Mailbox addresses
  /\b[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}\b/g,
  // DOMAIN\user logon names
  /\b[A-Za-z0-9.-]+\\[A-Za-z0-9._-]+\b/g,
  // key=value secrets in URLs or messages
  /\b(password|passwd|pwd|secret|policy[_-]?key)[=:\s]+\S+/gi,
];

/** Context keys whose values are always replaced */
const SENSITIVE_KEYS = ['password', 'secret', 'token', 'authorization', 'credential', 'policykey'];

const DEFAULT_REDACTION = '[REDACTED]';

// =============================================================================
// Redaction
// =============================================================================

/**
 * Replace every match of the given patterns in a string
 */
export function redactText(
  text: string,
  patterns: RegExp[] = DEFAULT_REDACT_PATTERNS,
  replacement: string = DEFAULT_REDACTION
): string {
  if (!text) {
    return text;
  }

  let redacted = text;
  for (const pattern of patterns) {
    pattern.lastIndex = 0;
    redacted = redacted.replace(pattern, replacement);
  }
  return redacted;
}

function isSensitiveKey(key: string): boolean {
  const lower = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitive) => lower.includes(sensitive));
}

/**
 * Recursively redact a value. Objects keep their keys; values under
 * sensitive keys are replaced wholesale.
 */
export function redactValue(
  value: unknown,
  patterns: RegExp[] = DEFAULT_REDACT_PATTERNS,
  replacement: string = DEFAULT_REDACTION
): unknown {
  if (value === null || value === undefined) {
    return value;
  }
  if (typeof value === 'string') {
    return redactText(value, patterns, replacement);
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, patterns, replacement));
  }
  if (typeof value === 'object') {
    return redactRecord(Object.entries(value), patterns, replacement);
  }
  return value;
}

function redactRecord(
  entries: Array<[string, unknown]>,
  patterns: RegExp[],
  replacement: string
): LogContext {
  const redacted: LogContext = {};
  for (const [key, value] of entries) {
    redacted[key] = isSensitiveKey(key) ? replacement : redactValue(value, patterns, replacement);
  }
  return redacted;
}

/**
 * Stable 16-character digest of an account identity
 */
export function hashIdentity(identity: string): string {
  if (!identity) {
    return '';
  }
  return createHash('sha256').update(identity).digest('hex').slice(0, 16);
}

function levelFromEnv(): LogLevel | undefined {
  const value = process.env['LOG_LEVEL']?.toLowerCase();
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'fatal':
      return value;
    default:
      return undefined;
  }
}

// =============================================================================
// Logger Implementation
// =============================================================================

export class Logger implements ILogger {
  private minLevel: LogLevel;
  private readonly includeTimestamps: boolean;
  private readonly jsonFormat: boolean;
  private readonly redactPatterns: RegExp[];
  private readonly redactStackTraces: boolean;
  private readonly baseContext: LogContext;
  private readonly output: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? levelFromEnv() ?? 'info';
    this.includeTimestamps = options.includeTimestamps ?? true;
    this.jsonFormat = options.jsonFormat ?? process.env['NODE_ENV'] === 'production';
    this.redactPatterns = options.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
    this.redactStackTraces = options.redactStackTraces ?? false;
    this.baseContext = options.baseContext ?? {};
    this.output = options.output ?? this.defaultOutput.bind(this);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  private sanitizeContext(context: LogContext): LogContext {
    const sanitized = redactRecord(Object.entries(context), this.redactPatterns, DEFAULT_REDACTION);
    // The raw identity is needed for the digest, so read it before redaction.
    if (typeof context.account === 'string') {
      sanitized.account = hashIdentity(context.account);
    }
    return sanitized;
  }

  private formatError(error: Error): NonNullable<LogEntry['error']> {
    const formatted: NonNullable<LogEntry['error']> = {
      name: error.name,
      message: redactText(error.message, this.redactPatterns),
    };

    if (error.stack) {
      formatted.stack = this.redactStackTraces
        ? '[STACK TRACE REDACTED]'
        : redactText(error.stack, this.redactPatterns);
    }

    return formatted;
  }

  private createEntry(
    level: LogLevel,
    message: string,
    error?: Error | null,
    context?: LogContext
  ): LogEntry {
    const sanitizedContext = this.sanitizeContext({ ...this.baseContext, ...context });

    const entry: LogEntry = {
      level,
      message: redactText(message, this.redactPatterns),
      timestamp: this.includeTimestamps ? new Date().toISOString() : '',
    };

    if (Object.keys(sanitizedContext).length > 0) {
      entry.context = sanitizedContext;
    }

    if (error) {
      entry.error = this.formatError(error);
    }

    return entry;
  }

  private defaultOutput(entry: LogEntry): void {
    if (this.jsonFormat) {
      this.writeToConsole(entry.level, JSON.stringify(entry));
      return;
    }

    const parts: string[] = [];
    if (entry.timestamp) {
      parts.push(`[${entry.timestamp}]`);
    }
    parts.push(`[${entry.level.toUpperCase().padEnd(5)}]`);

    const context: LogContext = entry.context ?? {};
    const { component, ...rest } = context;
    if (component) {
      parts.push(`[${component}]`);
    }
    parts.push(entry.message);
    if (Object.keys(rest).length > 0) {
      parts.push(JSON.stringify(rest));
    }

    this.writeToConsole(entry.level, parts.join(' '));

    if (entry.error?.stack) {
      this.writeToConsole(entry.level, entry.error.stack);
    }
  }

  private writeToConsole(level: LogLevel, message: string): void {
    switch (level) {
      case 'debug':
        console.debug(message);
        break;
      case 'info':
        console.info(message);
        break;
      case 'warn':
        console.warn(message);
        break;
      case 'error':
      case 'fatal':
        console.error(message);
        break;
    }
  }

  private log(level: LogLevel, message: string, error?: Error | null, context?: LogContext): void {
    if (!this.shouldLog(level)) {
      return;
    }
    this.output(this.createEntry(level, message, error, context));
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, null, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, null, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, null, context);
  }

  error(message: string, error?: Error | null, context?: LogContext): void {
    this.log('error', message, error, context);
  }

  fatal(message: string, error?: Error | null, context?: LogContext): void {
    this.log('fatal', message, error, context);
  }

  child(context: LogContext): ILogger {
    return new Logger({
      minLevel: this.minLevel,
      includeTimestamps: this.includeTimestamps,
      jsonFormat: this.jsonFormat,
      redactPatterns: this.redactPatterns,
      redactStackTraces: this.redactStackTraces,
      baseContext: { ...this.baseContext, ...context },
      output: this.output,
    });
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createLogger(options?: LoggerOptions): ILogger {
  return new Logger(options);
}

let defaultLogger: ILogger | null = null;

/**
 * Process-wide logger, created lazily
 */
export function getLogger(): ILogger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: ILogger): void {
  defaultLogger = logger;
}

/**
 * Reset the default logger (primarily for testing)
 */
export function resetDefaultLogger(): void {
  defaultLogger = null;
}
