// Diagnostic logging for channels.
//
// Channels take a Logger through their options instead of reading global
// toggles. The default logger is built on the `debug` package, so output is
// enabled per namespace through DEBUG:
//
//   DEBUG=blobwire:*                 everything
//   DEBUG=blobwire:message:error     buffer dumps on decode failure only
//   DEBUG=blobwire:*,-blobwire:stream  all but raw stream traces

import createDebug from "debug";

export type LogLevel = "trace" | "error";

export interface Logger {
  /** Per-operation tracing (sizes, channel names). */
  trace(format: string, ...args: unknown[]): void;

  /** Advisory failure output, such as buffer dumps. */
  error(format: string, ...args: unknown[]): void;

  /** Whether output at `level` goes anywhere; lets callers skip costly formatting. */
  enabled(level: LogLevel): boolean;
}

/**
 * Logger writing traces to `namespace` and errors to `namespace:error`.
 *
 * @example
 * ```typescript
 * const channel = new StreamChannel(stream, "peer-1", {
 *   logger: createLogger("myapp:wire"),
 * });
 * ```
 */
export function createLogger(namespace: string): Logger {
  const trace = createDebug(namespace);
  const error = createDebug(`${namespace}:error`);

  return {
    trace(format, ...args) {
      trace(format, ...args);
    },
    error(format, ...args) {
      error(format, ...args);
    },
    enabled(level) {
      return level === "trace" ? trace.enabled : error.enabled;
    },
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  trace() {},
  error() {},
  enabled: () => false,
};
