import { Params } from 'nestjs-pino';
import { multistream, type StreamEntry } from 'pino';
import pinoPretty from 'pino-pretty';
import { createWriteStream, mkdirSync } from 'fs';
import { join } from 'path';

const serviceName = process.env.SERVICE_NAME || 'flashcard-generation-service';
const logDir = process.env.LOG_DIR;

function buildStreams(): StreamEntry[] {
  const streams: StreamEntry[] = [
    // Console output with pretty formatting
    {
      level: 'info',
      stream:
        process.env.NODE_ENV !== 'production'
          ? pinoPretty({
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
              singleLine: false,
            })
          : process.stdout,
    },
  ];

  // File output with JSON formatting, only when a log directory is configured
  if (logDir) {
    mkdirSync(logDir, { recursive: true });
    streams.push({
      level: 'debug',
      stream: createWriteStream(join(logDir, `${serviceName}.log`), {
        flags: 'a',
      }),
    });
  }

  return streams;
}

export const pinoConfig: Params = {
  pinoHttp: {
    level: process.env.LOG_LEVEL || 'info',

    base: {
      service: serviceName,
      environment: process.env.NODE_ENV || 'development',
      version: process.env.APP_VERSION || '1.0.0',
    },

    redact: {
      paths: [
        'openaiApiKey',
        'googleApiKey',
        'anthropicApiKey',
        '*.openaiApiKey',
        '*.googleApiKey',
        '*.anthropicApiKey',
        'apiKey',
      ],
      remove: true,
    },

    timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,

    stream: multistream(buildStreams()),
  },
};
