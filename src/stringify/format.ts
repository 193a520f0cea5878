import type { NodeKey } from '../node/keys.js';
import type { ArrayFormat } from '../types.js';

/**
 * Renders a path as a query-string key. The first key is the bare base;
 * named keys become `[name]` (or `.name` with `allowDots`), indexed keys
 * follow `format`:
 *
 * - `indices` / `comma`: `[0]`
 * - `brackets`: `[]`
 * - `repeat`: nothing, so every element repeats the parent key
 */
export function formatKey(path: readonly NodeKey[], format: ArrayFormat, allowDots: boolean): string {
  let out = '';
  path.forEach((key, position) => {
    if (key.kind === 'named') {
      if (position === 0) out += key.name;
      else out += allowDots ? `.${key.name}` : `[${key.name}]`;
      return;
    }
    if (key.kind === 'pending' || format === 'brackets') {
      out += '[]';
      return;
    }
    if (format !== 'repeat') out += `[${key.index}]`;
  });
  return out;
}
