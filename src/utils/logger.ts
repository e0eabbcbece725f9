import pino from 'pino';
import { config } from '../config';

function createTransport() {
  return pino.transport({
    targets: [
      {
        target: 'pino-pretty',
        level: config.logLevel,
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
      ...(config.isProduction
        ? [
            {
              target: 'pino/file',
              level: config.logLevel,
              options: {
                destination: './logs/app.log',
                mkdir: true,
              },
            },
          ]
        : []),
    ],
  });
}

// Tests run without a transport worker so nothing is left running
export const logger = config.isTest
  ? pino({ level: 'silent' })
  : pino(
      {
        level: config.logLevel,
        base: {
          app: 'whodunit',
        },
      },
      createTransport()
    );

export const gameLogger = logger.child({ module: 'game' });
export const boardLogger = logger.child({ module: 'board' });
export const displayLogger = logger.child({ module: 'display' });
export const storeLogger = logger.child({ module: 'store' });
export const healthLogger = logger.child({ module: 'health' });
