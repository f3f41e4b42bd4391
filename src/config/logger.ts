import pino from 'pino';
import { env } from './environment';

// Sensitive fields to redact from logs
const redactPaths = [
  'password',
  'confirmPassword',
  'newPassword',
  'passwordHash',
  'password_hash',
  'hashed_password',
  'token',
  'accessToken',
  'access_token',
  'resetToken',
  'reset_token',
  'tokenHash',
  'authorization',
  'cookie',
  'secret',
  'jwtSecret',
  '*.password',
  '*.passwordHash',
  '*.token',
  '*.tokenHash',
  'req.headers.authorization',
  'req.headers.cookie',
];

export const logger = pino({
  level: env.LOG_LEVEL,
  base: { service: 'volunteer-signup', env: env.NODE_ENV },
  formatters: {
    level: (label) => ({ level: label }),
  },
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  serializers: {
    err: pino.stdSerializers.err,
    req: pino.stdSerializers.req,
    res: pino.stdSerializers.res,
  },
  transport:
    env.LOG_PRETTY && env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

const REQUEST_ID_PATTERN = /^[\w-]{1,64}$/;

export function generateRequestId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

/**
 * Keep a caller-supplied X-Request-Id when it is a plain token, otherwise mint one
 */
export function resolveRequestId(incoming: string | string[] | undefined): string {
  const candidate = Array.isArray(incoming) ? incoming[0] : incoming;
  return candidate && REQUEST_ID_PATTERN.test(candidate) ? candidate : generateRequestId();
}

export function createRequestLogger(requestId: string, method: string, path: string) {
  return logger.child({
    requestId,
    method,
    path,
  });
}
