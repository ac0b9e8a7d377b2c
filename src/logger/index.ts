import winston from 'winston';
import { mkdirSync } from 'fs';
import { join } from 'path';
import type { Config } from '../config/schema.js';
import { HostwatchError } from '../errors/index.js';

type LoggingConfig = Config['logging'];

const SIZE_UNITS: Record<string, number> = {
  b: 1,
  k: 1024,
  m: 1024 * 1024,
  g: 1024 * 1024 * 1024,
};

const SIZE_PATTERN = /^(\d+)([bkmg])$/i;

/**
 * Rotation size such as `10m` in bytes; the config schema only admits
 * strings matching SIZE_PATTERN
 */
export function sizeInBytes(size: string): number {
  const match = SIZE_PATTERN.exec(size);
  const count = match?.[1];
  const unit = match?.[2]?.toLowerCase();
  if (!count || !unit) {
    throw new RangeError(`Invalid log size: ${size}`);
  }
  return Number.parseInt(count, 10) * (SIZE_UNITS[unit] ?? 1);
}

/**
 * Flattens an error into log metadata, keeping the code and severity of
 * a HostwatchError
 */
export function errorMetadata(error?: Error, metadata?: object): object | undefined {
  if (!error) {
    return metadata;
  }
  return {
    error: {
      message: error.message,
      stack: error.stack,
      ...(error instanceof HostwatchError ? { code: error.code, severity: error.severity } : {}),
    },
    ...metadata,
  };
}

function lineFormat(format: LoggingConfig['format']): winston.Logform.Format {
  const { combine, timestamp, errors, json, colorize, printf } = winston.format;
  const base = combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), errors({ stack: true }));

  if (format === 'json') {
    return combine(base, json());
  }
  if (format === 'pretty') {
    return combine(
      base,
      colorize(),
      printf(({ timestamp: at, level, message, ...metadata }) => {
        const extra = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata, null, 2)}` : '';
        return `${String(at)} [${level}]: ${String(message)}${extra}`;
      })
    );
  }
  return combine(
    base,
    printf(({ timestamp: at, level, message }) => `${String(at)} [${level}]: ${String(message)}`)
  );
}

function fileTransports(config: LoggingConfig): winston.transport[] {
  mkdirSync(config.dir, { recursive: true });
  const rotation = { maxsize: sizeInBytes(config.maxSize), maxFiles: config.maxFiles };

  return [
    new winston.transports.File({ filename: join(config.dir, 'hostwatch-combined.log'), ...rotation }),
    new winston.transports.File({ filename: join(config.dir, 'hostwatch-error.log'), level: 'error', ...rotation }),
  ];
}

/**
 * Structured logger over winston. Console output goes to stderr at every
 * level because the stdio MCP transport owns stdout.
 */
export class Logger {
  private readonly logger: winston.Logger;

  constructor(
    private readonly config: LoggingConfig,
    parent?: winston.Logger
  ) {
    this.logger =
      parent ??
      winston.createLogger({
        level: config.level,
        format: lineFormat(config.format),
        transports: [
          new winston.transports.Console({ stderrLevels: ['error', 'warn', 'info', 'debug'] }),
          ...(config.toFile ? fileTransports(config) : []),
        ],
        exitOnError: false,
      });
  }

  debug(message: string, metadata?: object): void {
    this.logger.debug(message, metadata);
  }

  info(message: string, metadata?: object): void {
    this.logger.info(message, metadata);
  }

  warn(message: string, metadata?: object): void {
    this.logger.warn(message, metadata);
  }

  error(message: string, error?: Error, metadata?: object): void {
    this.logger.error(message, errorMetadata(error, metadata));
  }

  child(metadata: object): Logger {
    return new Logger(this.config, this.logger.child(metadata));
  }
}
