import { JSONLogger } from '../utils/logger';

/**
 * Property decorator that lazily attaches a `JSONLogger` scoped to the
 * given context. One logger is created per instance, on first access.
 */
export function Logger(context: string): PropertyDecorator {
  return (target: object, propertyKey: string | symbol) => {
    const loggers = new WeakMap<object, JSONLogger>();

    Object.defineProperty(target, propertyKey, {
      configurable: true,
      enumerable: false,
      get(this: object): JSONLogger {
        let logger = loggers.get(this);
        if (!logger) {
          logger = new JSONLogger(context);
          loggers.set(this, logger);
        }
        return logger;
      },
    });
  };
}
