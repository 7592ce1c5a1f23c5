type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  data?: unknown;
}

interface Logger {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
}

const isDev = process.env.NODE_ENV !== 'production';

function serializeData(data: unknown): string {
  try {
    const replacer = (_key: string, value: unknown) =>
      value instanceof Error ? { name: value.name, message: value.message } : value;
    return JSON.stringify(data, replacer);
  } catch {
    return '[Unserializable data]';
  }
}

function formatLog(entry: LogEntry): string {
  const { timestamp, level, module, message, data } = entry;
  const prefix = `[${timestamp}] [${level.toUpperCase()}] [${module}]`;
  return data === undefined ? `${prefix} ${message}` : `${prefix} ${message} ${serializeData(data)}`;
}

function createLogger(module: string): Logger {
  const log = (level: LogLevel, message: string, data?: unknown) => {
    const formatted = formatLog({
      timestamp: new Date().toISOString(),
      level,
      module,
      message,
      data,
    });

    switch (level) {
      case 'debug':
        if (isDev) console.debug(formatted);
        break;
      case 'info':
        console.info(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      case 'error':
        console.error(formatted);
        break;
    }
  };

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
  };
}

export { createLogger, formatLog };
export type { LogLevel, LogEntry, Logger };
