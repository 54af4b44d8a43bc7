/**
 * Formatter exports and selection.
 */
import { CompactFormatter } from './compact.js';
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IFormatter } from './types.js';

export * from './types.js';
export { CompactFormatter } from './compact.js';
export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';

export function createFormatter(options: FormatOptions): IFormatter {
  switch (options.format) {
    case 'compact':
      return new CompactFormatter();
    case 'json':
      return new JsonFormatter();
    case 'human':
      return new HumanFormatter(options);
  }
}
