import pino from 'pino';
import type { LogConfig } from './config.js';
import { resolveProjectPath } from './paths.js';

// Determine transport based on config
function getTransport(config: LogConfig): pino.TransportSingleOptions | pino.TransportMultiOptions {
  if (config.target === 'file') {
    return {
      targets: [
        {
          target: 'pino/file',
          options: {
            destination: resolveProjectPath(config.filePath),
            mkdir: true,
          },
        },
        // Always show warnings and errors in terminal (stderr), without stacks
        {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname,time,stack,err,error',
            messageFormat: '{if msg}{msg}{end}{if error.message}{if msg}: {end}{error.message}{end}',
            destination: 2, // stderr
          },
          level: 'warn',
        },
      ],
    };
  }

  // Default: stdout with pretty printing
  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss',
      ignore: 'pid,hostname',
      singleLine: true,
    },
  };
}

// Fields that must never reach a log line, even when passed by mistake
export const REDACTED_PATHS = [
  'password',
  'oldPassword',
  'newPassword',
  'privateKey',
  'sessionKey',
  'plaintext',
  '*.password',
  '*.privateKey',
  '*.plaintext',
];

// Level, redaction and serializers shared by every transport
export function loggerOptions(config: LogConfig): pino.LoggerOptions {
  return {
    level: config.level,
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    // Error objects are logged under `error`; pino only serializes `err` by default
    serializers: { error: pino.stdSerializers.err },
  };
}

// Create logger instance with given config
export function createLogger(config: LogConfig): pino.Logger {
  return pino({
    ...loggerOptions(config),
    transport: getTransport(config),
  });
}

// Module-level logger instance
// Must be initialized via initLogger() before use
let _logger: pino.Logger | undefined;

// Initialize the global logger
// Must be called early in entry point, before other modules use logger
export function initLogger(config: LogConfig): void {
  _logger = createLogger(config);
}

export function isLoggerInitialized(): boolean {
  return _logger !== undefined;
}

// Get the global logger instance
export function getLogger(): pino.Logger {
  if (!_logger) {
    throw new Error('Logger not initialized. Call initLogger() first.');
  }
  return _logger;
}

// Export logger as a getter for convenience
// Will throw if accessed before initLogger()
export const logger = new Proxy({} as pino.Logger, {
  get(_target, prop) {
    return (getLogger() as unknown as Record<string | symbol, unknown>)[prop];
  },
});

export default logger;
