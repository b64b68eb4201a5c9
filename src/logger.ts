import { createLogger, format, transports } from 'winston';
import { loadLogLevel } from './config.js';

const logger = createLogger({
  level: loadLogLevel(),
  format: format.combine(
    format.timestamp(),
    format.errors({ stack: true }),
    format.json(),
  ),
  transports: [
    new transports.Console({
      format: format.combine(format.colorize(), format.simple()),
    }),
  ],
});

export default logger;
