/**
 * Logger
 *
 * pino underneath. Two layers keep credentials out of log lines: context
 * values pass through sanitizeForLogging(), and pino's own redaction covers
 * the credential fields and auth header names the platform catalog declares.
 * Component, platform and principal travel as pino child bindings.
 */

import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';
import type { LoggingConfig } from '@relayhub/shared';
import { sanitizeForLogging } from '../utils/crypto.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  correlationId?: string;
  platform?: string;
  principalId?: string;
  component?: string;
  [key: string]: unknown;
}

export interface SecureLogger {
  trace(msg: string, context?: LogContext): void;
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(context: LogContext): SecureLogger;
  level: LogLevel;
}

export interface CreateLoggerOptions {
  /** Credential fields and header names to censor, e.g. PlatformCatalog.sensitiveNames() */
  sensitiveNames?: string[];
}

type LogOutput = LoggingConfig['output'][number];

const LOG_LEVELS: readonly string[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

/** Always censored, whatever the catalog declares. */
const BASE_SENSITIVE_NAMES = ['password', 'secret', 'token', 'api_key', 'apiKey', 'authorization'];

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/**
 * pino redact paths for the given names: top level and one level down for
 * identifiers, under `headers` for names such as `X-Api-Key`.
 */
export function redactPaths(names: readonly string[]): string[] {
  const paths = new Set<string>();
  for (const name of [...BASE_SENSITIVE_NAMES, ...names]) {
    for (const spelling of new Set([name, name.toLowerCase()])) {
      if (IDENTIFIER.test(spelling)) {
        paths.add(spelling);
        paths.add(`*.${spelling}`);
      } else {
        paths.add(`headers["${spelling}"]`);
      }
    }
  }
  return [...paths];
}

function outputTarget(output: LogOutput, level: LogLevel): pino.TransportTargetOptions {
  if (output.type === 'file') {
    return { target: 'pino/file', options: { destination: output.path, mkdir: true }, level };
  }
  if (output.format === 'pretty') {
    return {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
      level,
    };
  }
  return { target: 'pino/file', options: { destination: 1 }, level };
}

/**
 * A transport only when some output is more than JSON on stdout, which
 * pino writes on the main thread by itself.
 */
function createTransport(config: LoggingConfig): pino.TransportMultiOptions | undefined {
  const plainStdout = (o: LogOutput) => o.type === 'stdout' && o.format === 'json';
  if (config.output.every(plainStdout)) return undefined;
  return { targets: config.output.map((output) => outputTarget(output, config.level)) };
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sanitizeContext(context: LogContext | undefined): Record<string, unknown> {
  if (!context) return {};
  const sanitized = sanitizeForLogging(context);
  return isRecord(sanitized) ? sanitized : {};
}

class PinoSecureLogger implements SecureLogger {
  constructor(private readonly pino: PinoLogger) {}

  get level(): LogLevel {
    return isLogLevel(this.pino.level) ? this.pino.level : 'info';
  }

  trace(msg: string, context?: LogContext): void {
    this.pino.trace(sanitizeContext(context), msg);
  }

  debug(msg: string, context?: LogContext): void {
    this.pino.debug(sanitizeContext(context), msg);
  }

  info(msg: string, context?: LogContext): void {
    this.pino.info(sanitizeContext(context), msg);
  }

  warn(msg: string, context?: LogContext): void {
    this.pino.warn(sanitizeContext(context), msg);
  }

  error(msg: string, context?: LogContext): void {
    this.pino.error(sanitizeContext(context), msg);
  }

  fatal(msg: string, context?: LogContext): void {
    this.pino.fatal(sanitizeContext(context), msg);
  }

  child(context: LogContext): SecureLogger {
    return new PinoSecureLogger(this.pino.child(sanitizeContext(context)));
  }
}

export function createLogger(config: LoggingConfig, options: CreateLoggerOptions = {}): SecureLogger {
  const pinoOptions: LoggerOptions = {
    name: 'relayhub',
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: { err: pino.stdSerializers.err },
    formatters: { level: (label) => ({ level: label }) },
    redact: { paths: redactPaths(options.sensitiveNames ?? []), censor: '[REDACTED]' },
  };

  const transport = createTransport(config);
  return new PinoSecureLogger(
    transport ? pino(pinoOptions, pino.transport(transport)) : pino(pinoOptions)
  );
}

/**
 * Wrap an existing pino instance (custom destinations, tests).
 */
export function wrapPino(logger: PinoLogger): SecureLogger {
  return new PinoSecureLogger(logger);
}

/** Discards everything. */
export function createNoopLogger(): SecureLogger {
  const noop: SecureLogger = {
    trace: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
    fatal: () => {},
    child: () => noop,
    level: 'info',
  };
  return noop;
}
