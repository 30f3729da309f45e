import * as yaml from 'js-yaml';
import { ValidationError } from './errors.js';

/**
 * YAML loading with syntax errors shown in the context of the offending text.
 */

const CONTEXT_LINES = 3;
const LINE_NUMBER_WIDTH = 3;
const RULE = '------------------------------';

function lineNo(lineNumber: number, line: string): string {
  return `${String(lineNumber).padEnd(LINE_NUMBER_WIDTH)}| ${line}`;
}

/**
 * Number the lines of `text` in the half-open range [start, end) (0-based).
 */
export function prefixWithLineNumbers(text: string, start: number, end: number): string {
  const lines = text.split('\n');
  return lines
    .slice(start, end)
    .map((line, offset) => lineNo(start + offset + 1, line))
    .join('\n');
}

/**
 * Build the message shown for a YAML syntax error.
 *
 * @param errorLine - 0-based line of the error
 */
export function contextualizeYamlError(raw: string, errorLine: number, rawError: string): string {
  const minLine = Math.max(errorLine - CONTEXT_LINES, 0);
  const maxLine = errorLine + CONTEXT_LINES + 1;
  const niceError = prefixWithLineNumbers(raw, minLine, maxLine);

  return [
    `Syntax error near line ${errorLine + 1}`,
    RULE,
    niceError,
    '',
    'Raw Error:',
    RULE,
    rawError
  ].join('\n');
}

/**
 * Parse YAML text, raising a ValidationError with surrounding lines on syntax errors.
 */
export function loadYamlText(raw: string, sourceName?: string): unknown {
  try {
    return yaml.load(raw, sourceName ? { filename: sourceName } : undefined);
  } catch (error) {
    if (error instanceof yaml.YAMLException) {
      const message = error.mark
        ? contextualizeYamlError(raw, error.mark.line, error.message)
        : error.message;
      throw new ValidationError(message, sourceName ? { file: sourceName } : undefined);
    }
    throw error;
  }
}
