/**
 * Output Port Interface
 *
 * Commands write results and warnings through this interface instead of
 * calling console.log directly.
 *
 * Implementations:
 *   - consoleOutput (CLI): results on stdout, warnings on stderr
 *   - test doubles: collect lines in memory
 */

export interface OutputPort {
  /** Display a command result line */
  message(message: string): void;

  /** Display a warning about the result */
  warn(message: string): void;
}
