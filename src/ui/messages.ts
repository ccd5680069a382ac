/**
 * messages.ts — Warning and fatal message channels
 *
 * Façades report through a MessageSink rather than the console directly,
 * so that callers can collect or silence what gets emitted.
 */

import { FatalError } from "../errors.js";
import { log } from "./terminal.js";

export interface MessageSink {
  warning(message: string): void;
  /** Emit the message and abort the current operation. */
  fatal(message: string): never;
}

export const consoleMessages: MessageSink = {
  warning(message) {
    log.warn(message);
  },
  fatal(message): never {
    log.error(message);
    throw new FatalError(message);
  },
};

/** A sink that keeps messages in memory; `fatal` still throws. */
export function collectMessages(): MessageSink & { warnings: string[]; fatals: string[] } {
  const warnings: string[] = [];
  const fatals: string[] = [];
  return {
    warnings,
    fatals,
    warning(message) {
      warnings.push(message);
    },
    fatal(message): never {
      fatals.push(message);
      throw new FatalError(message);
    },
  };
}
