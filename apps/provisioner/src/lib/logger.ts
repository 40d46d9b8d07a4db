import pino from 'pino';

const isDevelopment = process.env.NODE_ENV === 'development';

// Logs go to stderr: stdout belongs to the terminal dialogs
const transport = isDevelopment
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        translateTime: 'HH:MM:ss',
        destination: 2,
      },
    }
  : undefined;

const options: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info'),
  base: undefined,
  // Redact sensitive fields
  redact: {
    paths: ['password', 'secret', '*.password', '*.secret'],
    remove: true,
  },
};

// Create the base logger
export const logger = transport
  ? pino({ ...options, transport })
  : pino(options, pino.destination(2));

export default logger;
