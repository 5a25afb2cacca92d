import { registerAs } from '@nestjs/config';
import { validate } from './env.validation';

export default registerAs('app', () => {
  const env = validate(process.env);

  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    rateLimitTtl: env.RATE_LIMIT_TTL,
    rateLimitMax: env.RATE_LIMIT_MAX,
  };
});
