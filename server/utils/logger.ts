import winston from 'winston';
import { getServerConfig } from '../config';

const { nodeEnv, logLevel } = getServerConfig();

const logger = winston.createLogger({
  level: logLevel === 'silent' ? 'info' : logLevel,
  silent: logLevel === 'silent',
  format:
    nodeEnv === 'production'
      ? winston.format.combine(winston.format.timestamp(), winston.format.json())
      : winston.format.combine(
          winston.format.colorize(),
          winston.format.timestamp({ format: 'HH:mm:ss' }),
          winston.format.printf(({ timestamp, level, message, ...meta }) => {
            const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
            return `${String(timestamp)} ${level}: ${String(message)}${extra}`;
          }),
        ),
  transports: [new winston.transports.Console()],
});

export default logger;
