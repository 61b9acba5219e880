import pino, { Logger, LoggerOptions } from 'pino';

// Customer contact details never reach the log stream
const REDACTED_PATHS = [
     'req.headers.authorization',
     'deliveryAddress.phone',
     'deliveryAddress.line1',
     '*.deliveryAddress.phone',
     '*.deliveryAddress.line1',
];

export function buildLoggerOptions(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
     const options: LoggerOptions = {
          level: env.LOG_LEVEL || 'info',
          formatters: {
               level: (label: string) => ({ level: label }),
          },
          serializers: {
               err: pino.stdSerializers.err,
               req: pino.stdSerializers.req,
               res: pino.stdSerializers.res,
          },
          redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
          base: {
               service: env.SERVICE_NAME || 'commerce-backoffice',
               environment: env.NODE_ENV || 'production',
          },
     };

     if (env.NODE_ENV === 'development') {
          options.transport = {
               target: 'pino-pretty',
               options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss Z',
                    ignore: 'pid,hostname',
               },
          };
     }
     return options;
}

export const logger = pino(buildLoggerOptions());

export function createChildLogger(context: Record<string, unknown>): Logger {
     return logger.child(context);
}
