/**
 * Logger interface
 *
 * Anything with leveled methods taking a message and optional metadata
 * satisfies it, including the winston loggers from ./logger.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Standardized component names for structured logging.
 *
 * Usage:
 *   createLogger(LogComponents.ACCESSOR).info('Connected');
 */
export const LogComponents = {
  ACCESSOR: 'VariableAccessor',
  CONNECTION: 'OpcUaConnection',
  CONFIG: 'Config',
} as const;

export type LogComponent = (typeof LogComponents)[keyof typeof LogComponents];
