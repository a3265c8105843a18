// Scam Honeypot - Console Logger
// Default logger used when a component is not handed one. Lines look like
// "[WARN] [StageController] message".

import type { Logger } from "./types.js";

export function createConsoleLogger(component?: string): Logger {
  const tag = component ? ` [${component}]` : "";
  return {
    info: (msg, ...args) => console.log(`[INFO]${tag} ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[WARN]${tag} ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[ERROR]${tag} ${msg}`, ...args),
    debug: (msg, ...args) => {
      if (process.env.DEBUG) console.debug(`[DEBUG]${tag} ${msg}`, ...args);
    },
  };
}
