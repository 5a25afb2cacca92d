import { LoggerService } from '@nestjs/common';
import { WinstonModule, utilities as nestWinstonModuleUtilities } from 'nest-winston';
import * as winston from 'winston';
import { Environment, LOG_LEVELS, LogLevel } from './env.validation';

function resolveLevel(raw: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === raw) ?? 'info';
}

export function createWinstonLogger(
  nodeEnv: string | undefined = process.env.NODE_ENV,
  level: string | undefined = process.env.LOG_LEVEL,
): LoggerService {
  const format =
    nodeEnv === Environment.Production
      ? winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json())
      : winston.format.combine(
          winston.format.timestamp(),
          winston.format.ms(),
          nestWinstonModuleUtilities.format.nestLike('ShowtimeCatalog', {
            colors: nodeEnv !== Environment.Test,
            prettyPrint: true,
          }),
        );

  return WinstonModule.createLogger({
    level: resolveLevel(level),
    transports: [new winston.transports.Console({ format })],
  });
}

export const winstonConfig = createWinstonLogger();
