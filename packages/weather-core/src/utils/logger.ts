/**
 * Simple console logger tagged with the emitting service
 */

export interface LogContext {
  service?: string;
  [key: string]: unknown;
}

export interface Logger {
  info(message: string, context?: Omit<LogContext, 'service'>): void;
  warn(message: string, context?: Omit<LogContext, 'service'>): void;
  error(message: string, context?: Omit<LogContext, 'service'>): void;
  debug(message: string, context?: Omit<LogContext, 'service'>): void;
}

function serializeValue(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return `${value.name}: ${value.message}`;
  }
  return value;
}

export function formatLog(level: string, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  const parts = [
    `[${timestamp}]`,
    `[${level}]`,
  ];

  const { service, ...rest } = context ?? {};
  if (service) {
    parts.push(`[${service}]`);
  }

  parts.push(message);

  if (Object.keys(rest).length > 0) {
    parts.push(JSON.stringify(rest, serializeValue));
  }

  return parts.join(' ');
}

export function createLogger(service: string): Logger {
  return {
    info(message, context) {
      console.log(formatLog('INFO', message, { ...context, service }));
    },

    warn(message, context) {
      console.warn(formatLog('WARN', message, { ...context, service }));
    },

    error(message, context) {
      console.error(formatLog('ERROR', message, { ...context, service }));
    },

    debug(message, context) {
      if (process.env.DEBUG) {
        console.log(formatLog('DEBUG', message, { ...context, service }));
      }
    },
  };
}
