export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

function envFlag(name: string): boolean {
  const v = String(process.env[name] ?? "").trim().toLowerCase();
  return v === "1" || v === "true";
}

// RELAYTERM_LOG turns on info/debug output; RELAYTERM_DEBUG_WS adds socket traces under the "ws" scope.
export function createLogger(scope?: string): Logger {
  const prefix = scope ? `[relayterm/${scope}]` : "[relayterm]";
  const verbose = () => envFlag("RELAYTERM_LOG") || (scope === "ws" && envFlag("RELAYTERM_DEBUG_WS"));
  return {
    debug: (...args) => {
      if (verbose()) console.log(prefix, ...args);
    },
    info: (...args) => {
      if (verbose()) console.log(prefix, ...args);
    },
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
  };
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
