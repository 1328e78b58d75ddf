/**
 * Serializer module: PhotometricRecord → canonical IESNA LM-63 bytes
 */

export { IesSerializer, serializeIes, trySerializeIes, formatTag } from './ies-serializer.js';
export type { SerializeOptions } from './ies-serializer.js';
export { formatFloat, formatInt } from './float-format.js';
