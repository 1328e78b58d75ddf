export { ByteCursor } from './byte-cursor.js';
export { FileByteSource, FileByteSink, MemoryByteSource, MemoryByteSink } from './byte-source.js';
export type { ByteSource, ByteSink } from './byte-source.js';
