export type Logger = {
  debug: (message: string) => void;
  warn: (message: string) => void;
};

export function createConsoleLogger(tag: string, debug = false): Logger {
  return {
    debug: (message) => {
      if (debug) console.log(`[${tag}] ${message}`);
    },
    warn: (message) => console.warn(`[${tag}] ${message}`)
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {}
};
