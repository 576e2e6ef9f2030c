import crypto from 'crypto';

type LogLevel = 'error' | 'warn' | 'info';

function generateCorrelationId(): string {
  return crypto.randomBytes(8).toString('hex');
}

function formatLogMessage(
  level: LogLevel,
  message: string,
  correlationId: string,
  context?: Record<string, unknown>,
  error?: unknown
): void {
  const timestamp = new Date().toISOString();

  const logEntry: Record<string, unknown> = {
    timestamp,
    level,
    correlationId,
    message,
  };

  if (context) {
    logEntry.context = context;
  }

  if (error) {
    logEntry.error = error instanceof Error ? error.stack || error.message : String(error);
  }

  if (level === 'error') {
    console.error(JSON.stringify(logEntry));
  } else if (level === 'warn') {
    console.warn(JSON.stringify(logEntry));
  } else {
    console.log(JSON.stringify(logEntry));
  }
}

/**
 * Message stored in a row's Error cell. Non-Error throwables are stringified;
 * the result is never blank, since a blank Error cell marks a successful row.
 */
export function describeError(error: unknown): string {
  const description = error instanceof Error ? error.message || error.name : String(error);
  return description.trim() ? description : 'Unknown error';
}

export function logInfo(message: string, context?: Record<string, unknown>): void {
  formatLogMessage('info', message, generateCorrelationId(), context);
}

export function logWarn(message: string, context?: Record<string, unknown>): void {
  formatLogMessage('warn', message, generateCorrelationId(), context);
}

export function logError(message: string, error?: unknown, context?: Record<string, unknown>): void {
  formatLogMessage('error', message, generateCorrelationId(), context, error);
}
