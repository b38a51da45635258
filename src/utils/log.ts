export interface Logger {
  info(message: string): void;
  ok(message: string): void;
  success(message: string): void;
  debug(message: string): void;
}

export function debugEnabled(value: string | undefined = process.env.ISOINJECT_DEBUG): boolean {
  if (!value) return false;
  const flag = value.trim().toLowerCase();
  return flag === "1" || flag === "true" || flag === "yes";
}

export function createConsoleLogger(options: { verbose?: boolean } = {}): Logger {
  const verbose = options.verbose ?? debugEnabled();
  return {
    info: (message) => console.log(`[ ] ${message}`),
    ok: (message) => console.log(`[ok] ${message}`),
    success: (message) => console.log(`[done] ${message}`),
    debug: (message) => {
      if (verbose) console.error(`[debug] ${message}`);
    }
  };
}

export const silentLogger: Logger = {
  info: () => {},
  ok: () => {},
  success: () => {},
  debug: () => {}
};
