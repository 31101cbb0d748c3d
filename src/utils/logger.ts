import winston from 'winston';
import path from 'path';

/**
 * Logger Configuration
 *
 * Structured logging for ingestion and analysis
 */

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...metadata }) => {
    let msg = `${timestamp} [${level}] ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  })
);

function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ];

  if (process.env.LOG_TO_FILE !== 'false') {
    transports.push(
      // All logs
      new winston.transports.File({
        filename: path.join(process.cwd(), 'logs', 'combined.log'),
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      // Errors only
      new winston.transports.File({
        filename: path.join(process.cwd(), 'logs', 'error.log'),
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  }

  return transports;
}

/**
 * Create a logger instance
 * @param component Component name (e.g., 'EntityResolver', 'ProofChainBuilder')
 */
export function createLogger(component: string): winston.Logger {
  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    silent: process.env.LOG_SILENT === 'true',
    format: logFormat,
    defaultMeta: { component },
    transports: buildTransports(),
  });
}

/**
 * Default logger instance
 */
export const logger = createLogger('App');

/**
 * Log levels:
 * - error: Failures that abort an operation (graph store unreachable)
 * - warn: Degraded outcomes (lookup/judgment failures, merge conflicts, dropped edges)
 * - info: Batch-level progress and summaries
 * - debug: Per-concept decisions
 */

/**
 * Logger scoped to the ingestion of one source document
 */
export class IngestionLogger {
  private logger: winston.Logger;
  private sourceId: string;

  constructor(sourceId: string, component: string = 'Ingestion') {
    this.sourceId = sourceId;
    this.logger = createLogger(`${component}:${sourceId}`);
  }

  info(message: string, metadata?: object) {
    this.logger.info(message, { sourceId: this.sourceId, ...metadata });
  }

  error(message: string, error?: unknown, metadata?: object) {
    this.logger.error(message, {
      sourceId: this.sourceId,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      ...metadata,
    });
  }

  warn(message: string, metadata?: object) {
    this.logger.warn(message, { sourceId: this.sourceId, ...metadata });
  }

  debug(message: string, metadata?: object) {
    this.logger.debug(message, { sourceId: this.sourceId, ...metadata });
  }

  /**
   * Log a stage transition within the ingestion
   */
  statusChange(from: string, to: string, metadata?: object) {
    this.info(`Stage changed: ${from} -> ${to}`, metadata);
  }

  started(metadata?: object) {
    this.info('Ingestion started', metadata);
  }

  completed(metadata?: object) {
    this.info('Ingestion completed', metadata);
  }

  failed(error: unknown, metadata?: object) {
    this.error('Ingestion failed', error, metadata);
  }
}
