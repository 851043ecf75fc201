// Console logging with debug-style namespaces.
//
// info/warn/error always print. debug prints only when the DEBUG environment
// variable matches the namespace, e.g. DEBUG=tagkv:* or DEBUG=*,-tagkv:conn.

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
export function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === '*') return true;

  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&') // Escape special chars except *
    .replace(/\*/g, '.*');

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Check a namespace against a DEBUG-style list. Later patterns override
 * earlier ones; a leading `-` excludes.
 */
export function isEnabled(namespace: string, debug: string | undefined): boolean {
  if (!debug) return false;

  let enabled = false;
  for (const pattern of debug.split(/[\s,]+/).filter(Boolean)) {
    if (pattern.startsWith('-')) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }
  return enabled;
}

export function createLogger(
  namespace: string,
  debug: string | undefined = process.env.DEBUG
): Logger {
  const debugEnabled = isEnabled(namespace, debug);
  const prefix = `[${namespace}]`;
  return {
    debug(message, ...args) {
      if (debugEnabled) console.debug(prefix, message, ...args);
    },
    info(message, ...args) {
      console.log(prefix, message, ...args);
    },
    warn(message, ...args) {
      console.warn(prefix, message, ...args);
    },
    error(message, ...args) {
      console.error(prefix, message, ...args);
    },
  };
}
