import pino from 'pino';

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const NODE_ENV = process.env.NODE_ENV || 'development';
const SERVICE_NAME = 'entry-pass-service';

// Credentials and attendee contact details never reach the logs
export const REDACT_PATHS = [
  'password',
  '*.password',
  'passwordHash',
  '*.passwordHash',
  'temporaryPassword',
  '*.temporaryPassword',
  'token',
  '*.token',
  'qrPayload',
  '*.qrPayload',
  'qrData',
  '*.qrData',
  'teamLeaderEmail',
  '*.teamLeaderEmail',
  'req.headers.authorization',
  'req.body.password',
  'req.body.qrData',
  'req.body.teamLeaderEmail',
];

export const loggerOptions: pino.LoggerOptions = {
  name: SERVICE_NAME,
  level: LOG_LEVEL,
  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: SERVICE_NAME,
    env: NODE_ENV,
  },
  ...(NODE_ENV === 'development' && {
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  }),
};

export const logger = pino(loggerOptions);

export function createLogger(component: string): pino.Logger {
  return logger.child({ component });
}

export default logger;
