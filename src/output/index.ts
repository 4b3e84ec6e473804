/**
 * Output module exports - type and error formatters
 */

export {
  TypeNamer,
  typeToString,
  schemeToString,
  formatError,
  formatTraceEvent,
  formatReport,
  formatJSON,
} from './formatter.js';

export type { FormatOptions } from './formatter.js';
