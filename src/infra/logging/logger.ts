import type { LogContext, LoggerPort } from '../../app/ports/logger_port';

function formatContext(context?: LogContext): string {
  if (!context || Object.keys(context).length === 0) {
    return '';
  }

  return ` ${JSON.stringify(context)}`;
}

export function createLogger(component = 'bot', now: () => Date = () => new Date()): LoggerPort {
  const line = (level: string, message: string, context?: LogContext): string =>
    `${now().toISOString()} [${level}] [${component}] ${message}${formatContext(context)}`;

  return {
    info(message, context) {
      console.log(line('INFO', message, context));
    },
    warn(message, context) {
      console.warn(line('WARN', message, context));
    },
    error(message, context) {
      console.error(line('ERROR', message, context));
    }
  };
}
