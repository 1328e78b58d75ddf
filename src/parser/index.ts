/**
 * Parser module: IESNA LM-63 text → PhotometricRecord
 */

export { parseIes, tryParseIes, parsePhotometry } from './ies-parser.js';
export type { ParseOptions, PhotometricSection } from './ies-parser.js';
export { readFields, readFloatArray, scanNumber, skipDelimiters, isDelimiter } from './field-reader.js';
export type { TokenKind, ScannedNumber } from './field-reader.js';
export { resolveFormat, FORMAT_TAGS } from './format-resolver.js';
export { readLabelSection, TILT_PREFIX } from './label-section.js';
export type { LabelSection } from './label-section.js';
export { parseTilt, resolveTilt } from './tilt-parser.js';
