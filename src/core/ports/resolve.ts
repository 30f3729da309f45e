/**
 * Port Resolution Helpers
 * 
 * Falls back to the console adapter when a caller supplies no port.
 */

import type { OutputPort } from './output.js';
import { consoleOutput } from './console-output.js';

export function resolveOutput(ctx?: { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}
