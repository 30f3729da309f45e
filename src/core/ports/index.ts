/**
 * Core Ports
 * 
 * Re-exports port interfaces and default implementations.
 */

export type { OutputPort } from './output.js';
export { consoleOutput } from './console-output.js';
export { resolveOutput } from './resolve.js';
