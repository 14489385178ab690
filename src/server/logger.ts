import pino, { stdTimeFunctions, type DestinationStream, type Logger } from 'pino';
import type { AppConfig } from './config.js';

let baseLogger: Logger = pino({
  level: process.env.NODE_ENV === 'test' ? 'silent' : 'info',
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

function createDestination(format: AppConfig['logging']['format']): DestinationStream {
  if (format === 'pretty') {
    return pino.transport({
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:standard' }
    });
  }
  return pino.destination({ dest: process.stdout.fd, sync: false });
}

export function initialiseLogger(config: AppConfig): void {
  baseLogger = pino(
    {
      level: config.logging.level,
      base: { service: 'tracking-service' },
      timestamp: stdTimeFunctions.isoTime
    },
    createDestination(config.logging.format)
  );
}

// Resolves the base logger lazily so module-level loggers pick up initialiseLogger().
function createLoggerProxy(factory: () => Logger): Logger {
  return new Proxy(
    {},
    {
      get(_target, property) {
        const target = factory();
        const value: unknown = Reflect.get(target, property, target);
        return typeof value === 'function' ? value.bind(target) : value;
      }
    }
  ) as Logger;
}

export function createLogger(scope: string): Logger {
  return createLoggerProxy(() => baseLogger.child({ scope }));
}
