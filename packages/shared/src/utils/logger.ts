import winston from 'winston';
import LokiTransport from 'winston-loki';

const logLevel = process.env.LOG_LEVEL || 'info';
const serviceName = process.env.SERVICE_NAME || 'poe-relay';
const lokiUrl = process.env.LOKI_URL || 'http://localhost:3100';

// Create base logger with multiple transports
const transports: winston.transport[] = [
  // Console transport with high-density format
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.timestamp({ format: 'HH:mm:ss' }),
      winston.format.printf((info) => {
        // Skip pid and nodeVersion
        const { timestamp, level: _level, service, message, pid: _pid, nodeVersion: _nodeVersion, ...meta } = info;

        // Collapse message to single line
        const cleanMessage = String(message).replace(/\n/g, ' ').replace(/\s+/g, ' ').trim();

        // Only show meta if it has meaningful content
        const hasUsefulMeta =
          Object.keys(meta).length > 0 &&
          !Object.values(meta).every((v) => v === undefined || v === null);

        const metaStr = hasUsefulMeta ? ` ${JSON.stringify(meta)}` : '';

        // Short service names
        const shortService = String(service || 'unknown').replace('@poe-relay/', '').substring(0, 8);

        return `${String(timestamp)} ${shortService}: ${cleanMessage}${metaStr}`;
      })
    ),
  }),
];

// Add Loki transport if URL is configured
if (process.env.LOKI_URL && process.env.LOKI_URL !== 'disabled') {
  transports.push(
    new LokiTransport({
      host: lokiUrl,
      labels: {
        service: serviceName,
        environment: process.env.NODE_ENV || 'development',
        host: process.env.HOSTNAME || 'localhost',
      },
      json: true,
      format: winston.format.json(),
      replaceTimestamp: true,
      onConnectionError: (err: unknown) => {
        console.error('Loki connection error:', err);
      },
    })
  );
}

// Add file transports in production
if (process.env.NODE_ENV === 'production') {
  transports.push(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
      format: winston.format.json(),
    }),
    new winston.transports.File({
      filename: 'logs/combined.log',
      format: winston.format.json(),
    })
  );
}

export const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: {
    service: serviceName,
    pid: process.pid,
    nodeVersion: process.version,
  },
  transports,
});

export type Logger = winston.Logger;

export interface LogMetrics {
  duration?: number;
  guildId?: string;
  userId?: string;
  command?: string;
  model?: string;
  correlationId?: string;
  success?: boolean;
  error?: string;
  responseLength?: number;
  segments?: number;
}

// Performance monitoring utilities
export const performanceLogger = {
  startTimer: (label: string) => {
    const start = process.hrtime.bigint();
    return {
      end: (meta?: LogMetrics) => {
        const duration = Number(process.hrtime.bigint() - start) / 1000000; // Convert to ms
        logger.info(`${label} completed`, {
          ...meta,
          duration: Math.round(duration),
        });
        return duration;
      },
    };
  },

  measureAsync: async <T>(label: string, fn: () => Promise<T>, meta?: LogMetrics): Promise<T> => {
    const timer = performanceLogger.startTimer(label);
    try {
      const result = await fn();
      timer.end({ ...meta, success: true });
      return result;
    } catch (error) {
      timer.end({ ...meta, success: false, error: error instanceof Error ? error.message : 'Unknown error' });
      throw error;
    }
  },
};

export default logger;
