/**
 * Unified output abstraction for interactive vs non-interactive flows.
 *
 * Routes to clack (interactive UI) or plain console output based on the
 * current mode:
 *   setOutputMode(true);  // clack UI
 *   output.info('Hello');
 */

import { log } from '@clack/prompts';

let isInteractiveMode = false;

/**
 * Set the output mode for all subsequent output calls.
 * Should be called once at the start of a command flow.
 */
export function setOutputMode(interactive: boolean): void {
  isInteractiveMode = interactive;
}

export const output = {
  info(message: string): void {
    if (isInteractiveMode) {
      log.info(message);
    } else {
      console.log(message);
    }
  },

  /**
   * Raw text for stdout; never decorated, so it can be piped or eval'd
   */
  message(message: string): void {
    console.log(message);
  },

  success(message: string): void {
    if (isInteractiveMode) {
      log.success(message);
    } else {
      console.log(`✓ ${message}`);
    }
  }
};
