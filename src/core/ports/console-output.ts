/**
 * Console Output Adapter
 *
 * Results go to stdout so they can be piped; warnings go to stderr.
 */

import pico from 'picocolors';
import type { OutputPort } from './output.js';

export const consoleOutput: OutputPort = {
  message(message: string): void {
    console.log(message);
  },

  warn(message: string): void {
    console.error(pico.yellow(`⚠ ${message}`));
  },
};
