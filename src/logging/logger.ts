/**
 * Logger Configuration
 * Winston-based logging shared by every component of the accessor.
 *
 * LOG_LEVEL  - winston level (default: info)
 * LOG_FORMAT - 'json' or 'pretty' (default: json)
 */

import winston from 'winston';
import type { Logger, LogComponent } from './types';

const logLevel = process.env.LOG_LEVEL || 'info';
const logFormat = process.env.LOG_FORMAT || 'json';

const prettyFormat = winston.format.printf(({ level, message, timestamp, component, ...metadata }) => {
  let msg = `${timestamp} [${level.toUpperCase()}]`;

  if (component) {
    msg += ` [${component}]`;
  }

  msg += `: ${message}`;

  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

// A library has no business writing log files, so console is the only transport
const rootLogger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    logFormat === 'pretty' ? prettyFormat : winston.format.json()
  ),
  defaultMeta: { service: 'opcua-variable-accessor' },
  transports: [new winston.transports.Console()],
});

/**
 * Child logger tagged with the given component name
 */
export function createLogger(component: LogComponent): Logger {
  return rootLogger.child({ component });
}

export default rootLogger;
