import path from 'path';
import winston from 'winston';
import { config } from '../config/environment';

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: {
    service: 'vocab-service',
    version: process.env.npm_package_version || '1.0.0'
  },
  transports: []
});

if (config.logDir) {
  logger.add(new winston.transports.File({
    filename: path.join(config.logDir, 'error.log'),
    level: 'error',
    maxsize: 5242880, // 5MB
    maxFiles: 5
  }));
  logger.add(new winston.transports.File({
    filename: path.join(config.logDir, 'combined.log'),
    maxsize: 5242880,
    maxFiles: 5
  }));
}

// Console output everywhere; colourised lines outside production
logger.add(new winston.transports.Console({
  format: config.nodeEnv === 'production'
    ? winston.format.json()
    : winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, service, version: _version, ...meta }) => {
        let msg = `${timestamp} [${service}] ${level}: ${message}`;

        const metaKeys = Object.keys(meta);
        if (metaKeys.length > 0) {
          msg += ` ${JSON.stringify(meta)}`;
        }

        return msg;
      })
    )
}));

// Access lines go out at info so the default LOG_LEVEL keeps them
export const ACCESS_LOG_LEVEL = 'info';

// Stream for morgan access logs
export const httpLogStream = {
  write: (message: string): void => {
    logger.log(ACCESS_LOG_LEVEL, message.trim());
  }
};

export default logger;
