import { Global, Module } from '@nestjs/common';
import { LoggerModule as PinoLoggerModule, Params } from 'nestjs-pino';
import { randomUUID } from 'crypto';
import { IncomingMessage, ServerResponse } from 'http';
import { EnvConfigService } from '../../config/env-config.service';
import { AppLoggerService } from './app-logger.service';

interface SerializedRequest {
  id: string;
  method: string;
  url: string;
}

interface SerializedResponse {
  statusCode: number;
}

const headerValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

// pino-http stores the generated id on req.id
const requestId = (req: IncomingMessage): string =>
  'id' in req && (typeof req.id === 'string' || typeof req.id === 'number') ? String(req.id) : '';

export const buildPinoParams = (config: EnvConfigService): Params => ({
  pinoHttp: {
    level: config.logLevel ?? (config.isProduction ? 'info' : 'debug'),

    // Readable output in development, JSON in production
    transport: config.isProduction
      ? undefined
      : {
          target: 'pino-pretty',
          options: {
            colorize: true,
            singleLine: false,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        },

    genReqId: (req: IncomingMessage): string =>
      headerValue(req.headers['x-request-id']) || randomUUID(),

    customProps: (req: IncomingMessage): Record<string, unknown> => ({
      requestId: requestId(req),
      userAgent: req.headers['user-agent'],
      ip: req.socket?.remoteAddress,
    }),

    redact: {
      paths: [
        'req.headers.authorization',
        'req.headers.cookie',
        'req.body.password',
        'req.body.token',
      ],
      censor: '[REDACTED]',
    },

    serializers: {
      req: (req: IncomingMessage): SerializedRequest => ({
        id: requestId(req),
        method: req.method ?? '',
        url: req.url ?? '',
      }),
      res: (res: ServerResponse): SerializedResponse => ({
        statusCode: res.statusCode,
      }),
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err: Error | undefined,
    ): 'error' | 'warn' | 'info' => {
      if (res.statusCode >= 500 || err) return 'error';
      if (res.statusCode >= 400) return 'warn';
      return 'info';
    },

    customSuccessMessage: (req: IncomingMessage, res: ServerResponse): string =>
      `${req.method ?? 'UNKNOWN'} ${req.url ?? '/'} completed with ${res.statusCode}`,
    customErrorMessage: (req: IncomingMessage, _res: ServerResponse, err: Error): string =>
      `${req.method ?? 'UNKNOWN'} ${req.url ?? '/'} failed: ${err.message}`,
  },
});

@Global()
@Module({
  imports: [
    PinoLoggerModule.forRootAsync({
      inject: [EnvConfigService],
      useFactory: buildPinoParams,
    }),
  ],
  providers: [AppLoggerService],
  exports: [PinoLoggerModule, AppLoggerService],
})
export class LoggerModule {}
