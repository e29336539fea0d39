/**
 * Structured logging with secret redaction
 *
 * Security requirements:
 * - Never log passwords, tokens, node certificates or private keys in plaintext
 * - Redact by key name (context objects) and by pattern (free text)
 * - Support JSON lines for CI/automation and an append-only forensic log file
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

/**
 * Where formatted lines go. Defaults to stderr so `--json` stdout stays clean.
 */
export type LogSink = (line: string, level: LogLevel) => void;

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output as JSON (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: true) */
  timestamps?: boolean;
  /** Append every entry as a JSON line to this file, regardless of level */
  filePath?: string;
  sink?: LogSink;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Patterns to identify sensitive values in free text
 */
const SENSITIVE_PATTERNS = [
  // Bearer tokens
  /Bearer\s+[a-zA-Z0-9._-]+/gi,

  // JWT tokens
  /eyJ[a-zA-Z0-9_-]*\.eyJ[a-zA-Z0-9_-]*\.[a-zA-Z0-9_-]*/g,

  // PEM private keys
  /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,

  // key=value style secrets on command lines
  /(?<=(?:password|secret|token)=)[^\s&"']+/gi,
];

/**
 * Object keys (lowercased) whose values are always redacted
 */
const SENSITIVE_KEYS = new Set([
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'accesstoken',
  'access_token',
  'authorization',
  'credentials',
  'private_key',
  'privatekey',
  'cert',
  'certificate',
  'node_cert',
  'nodecert',
  'panel_password',
  'panelpassword',
]);

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_VALUES;
}

// =============================================================================
// Redaction Functions
// =============================================================================

/**
 * Redact a potentially sensitive string value
 * Shows first 4 and last 4 characters for debugging
 *
 * @example
 * redactString('test-secret-value') // 'test...alue'
 * redactString('short') // '[REDACTED]'
 */
export function redactString(value: string): string {
  if (!value || value.length < 10) {
    return '[REDACTED]';
  }
  return value.substring(0, 4) + '...' + value.substring(value.length - 4);
}

/**
 * Apply pattern-based redaction to a string
 */
export function redactPatterns(value: string): string {
  let result = value;
  for (const pattern of SENSITIVE_PATTERNS) {
    pattern.lastIndex = 0;
    result = result.replace(pattern, (match) => redactString(match));
  }
  return result;
}

/**
 * Redact sensitive values in any value (deep copy with redaction)
 */
export function redactValue(value: unknown, depth = 0): unknown {
  if (depth > 10) {
    return '[MAX_DEPTH]';
  }
  if (value === null || value === undefined) {
    return value;
  }
  if (typeof value === 'string') {
    return redactPatterns(value);
  }
  if (typeof value !== 'object') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }
  return redactContext(Object.fromEntries(Object.entries(value)), depth);
}

/**
 * Redact sensitive keys in a context object
 */
export function redactContext(
  context: Record<string, unknown>,
  depth = 0
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      if (typeof value === 'string' && value.length > 0) {
        result[key] = redactString(value);
      } else if (value !== null && value !== undefined) {
        result[key] = '[REDACTED]';
      } else {
        result[key] = value;
      }
    } else {
      result[key] = redactValue(value, depth + 1);
    }
  }
  return result;
}

// =============================================================================
// Logger Class
// =============================================================================

const stderrSink: LogSink = (line) => {
  console.error(line);
};

/**
 * Logger with JSON output, bound context and automatic secret redaction
 */
export class Logger {
  private readonly config: Required<Omit<LoggerConfig, 'filePath'>> & { filePath?: string };
  private readonly bound: Record<string, unknown>;

  constructor(config: LoggerConfig = {}, bound: Record<string, unknown> = {}) {
    this.config = {
      level: config.level ?? 'info',
      json: config.json ?? false,
      timestamps: config.timestamps ?? true,
      sink: config.sink ?? stderrSink,
      filePath: config.filePath,
    };
    this.bound = bound;
    if (this.config.filePath) {
      mkdirSync(dirname(this.config.filePath), { recursive: true });
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message: redactPatterns(message),
    };

    const merged = { ...this.bound, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = redactContext(merged);
    }

    if (error) {
      const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
      entry.error = {
        name: error.name,
        message: redactPatterns(error.message),
        ...(code ? { code } : {}),
        stack: error.stack ? redactPatterns(error.stack) : undefined,
      };
    }

    return entry;
  }

  /**
   * Format entry for output
   */
  formatEntry(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [];
    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }
    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }
    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  private write(entry: LogEntry): void {
    if (this.config.filePath) {
      appendFileSync(this.config.filePath, JSON.stringify(entry) + '\n', 'utf-8');
    }
    if (this.shouldLog(entry.level)) {
      this.config.sink(this.formatEntry(entry), entry.level);
    }
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.shouldLog(level) && !this.config.filePath) return;
    this.write(this.createEntry(level, message, context, error));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger with additional bound context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger(this.config, { ...this.bound, ...context });
  }

  getConfig(): LoggerConfig {
    return { ...this.config };
  }
}

// =============================================================================
// Factories
// =============================================================================

/**
 * Create a new logger with custom configuration
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return new Logger(config);
}

/**
 * Logger that drops everything; the default for library callers and tests
 */
export function silentLogger(): Logger {
  return new Logger({ level: 'error', sink: () => {} });
}
