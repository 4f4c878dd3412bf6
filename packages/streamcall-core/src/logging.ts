// Namespaced debug logging for streamcall.
//
// Logging is controlled by the DEBUG environment variable, using the same
// pattern syntax as npm's debug package:
//
//   DEBUG=streamcall:*            all streamcall logging
//   DEBUG=streamcall:reader       only the streaming reader
//   DEBUG=*,-streamcall:calls     everything except the call registry

export interface LoggerOptions {
  /**
   * Source of the DEBUG pattern list. Defaults to reading
   * `process.env.DEBUG` on every log call.
   */
  debug?: () => string | undefined;
}

/** Logger bound to a single namespace. */
export interface Logger {
  readonly namespace: string;

  /** Whether the namespace is currently enabled. */
  enabled(): boolean;

  /** Log a structured debug line when enabled. */
  debug(message: string, data?: Record<string, unknown>): void;
}

/**
 * Check if a namespace is enabled by a DEBUG pattern list.
 * Supports wildcards (*) and exclusions (-prefix).
 */
export function isEnabled(namespace: string, debug: string | undefined): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create a logger for a namespace.
 *
 * Lines go to `console.log` as `[namespace] message` followed by the
 * structured data object, so they stay expandable in inspectors.
 *
 * @example
 * ```typescript
 * const log = createLogger("streamcall:reader");
 * log.debug("read", { bytes: 12 });
 * // DEBUG=streamcall:* prints: [streamcall:reader] read { bytes: 12 }
 * ```
 */
export function createLogger(namespace: string, options: LoggerOptions = {}): Logger {
  const readDebug = options.debug ?? (() => process.env.DEBUG);

  return {
    namespace,

    enabled(): boolean {
      return isEnabled(namespace, readDebug());
    },

    debug(message: string, data: Record<string, unknown> = {}): void {
      if (!isEnabled(namespace, readDebug())) return;
      console.log(`[${namespace}] ${message}`, data);
    },
  };
}
