import { Params } from 'nestjs-pino';
import { getCorrelationId } from '../services/correlation-context';

const isProduction = process.env.NODE_ENV === 'production';

export const loggerConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),

    // NOTE: customProps only applies to HTTP-triggered logs (status API).
    // Tick and shutdown code paths put correlationId in their log objects.
    customProps: (): Record<string, unknown> => ({
      correlationId: getCorrelationId(),
    }),

    transport: !isProduction
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            singleLine: false,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,

    base: null,

    serializers: {
      req: () => undefined,
      res: () => undefined,
    },

    autoLogging: false,
  },
};
