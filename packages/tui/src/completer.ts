/**
 * @fileoverview Tab Completion
 *
 * Adapts the session's autocomplete index to node:readline's completer
 * signature: candidates plus the substring they replace.
 */
import type { Autocomplete } from '@necromancers-shell/core';

export type ReadlineCompleter = (line: string) => [string[], string];

export function createCompleter(autocomplete: Autocomplete): ReadlineCompleter {
  return (line) => {
    const { candidates, prefix } = autocomplete.completeLine(line);
    return [candidates, prefix];
  };
}
