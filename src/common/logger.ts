import createDebug from 'debug';

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
}

/**
 * Engine logger used when no command is attached. Output shows up with DEBUG=tierform:*
 */
export const createDebugLogger = (namespace: string): Logger => {
  const debug = createDebug(`tierform:${namespace}`);
  return {
    log: (message) => debug(message),
    warn: (message) => debug(`warning: ${message}`),
    debug: (message) => debug(message),
  };
};
