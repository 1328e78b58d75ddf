/**
 * Byte-level collaborators: where documents come from and where
 * serialized output goes.
 *
 * File-backed implementations use fs/promises; the in-memory ones are
 * for embedding and tests.
 */

import fs from 'fs/promises';
import path from 'path';

export interface ByteSource {
  /** Resolve to the resource's bytes, or undefined when missing, unreadable or empty. */
  acquire(identifier: string): Promise<Uint8Array | undefined>;
}

export interface ByteSink {
  /** Resolve to true when every byte was written. */
  persist(identifier: string, bytes: Uint8Array): Promise<boolean>;
}

/**
 * Reads files from disk. Relative identifiers resolve against `baseDir`
 * (default: the process working directory).
 */
export class FileByteSource implements ByteSource {
  constructor(private readonly baseDir: string = process.cwd()) {}

  /** Source whose relative names resolve next to `filePath`. */
  static besideFile(filePath: string): FileByteSource {
    return new FileByteSource(path.dirname(path.resolve(filePath)));
  }

  resolve(identifier: string): string {
    return path.resolve(this.baseDir, identifier);
  }

  async acquire(identifier: string): Promise<Uint8Array | undefined> {
    if (!identifier) {
      return undefined;
    }
    try {
      const data = await fs.readFile(this.resolve(identifier));
      return data.length > 0 ? data : undefined;
    } catch {
      // Missing and unreadable resources are both reported as absent
      return undefined;
    }
  }
}

export class FileByteSink implements ByteSink {
  constructor(private readonly baseDir: string = process.cwd()) {}

  async persist(identifier: string, bytes: Uint8Array): Promise<boolean> {
    if (!identifier) {
      return false;
    }
    const target = path.resolve(this.baseDir, identifier);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, bytes);
      return true;
    } catch {
      return false;
    }
  }
}

/** In-process source backed by a map of identifier → bytes. */
export class MemoryByteSource implements ByteSource {
  private readonly entries = new Map<string, Uint8Array>();

  constructor(entries: Record<string, string | Uint8Array> = {}) {
    for (const [id, value] of Object.entries(entries)) {
      this.set(id, value);
    }
  }

  set(identifier: string, value: string | Uint8Array): this {
    this.entries.set(identifier, typeof value === 'string' ? Buffer.from(value, 'latin1') : value);
    return this;
  }

  async acquire(identifier: string): Promise<Uint8Array | undefined> {
    const bytes = this.entries.get(identifier);
    return bytes && bytes.length > 0 ? bytes : undefined;
  }
}

/** In-process sink that keeps everything written to it. */
export class MemoryByteSink implements ByteSink {
  readonly written = new Map<string, Uint8Array>();

  async persist(identifier: string, bytes: Uint8Array): Promise<boolean> {
    if (!identifier) {
      return false;
    }
    this.written.set(identifier, bytes);
    return true;
  }

  text(identifier: string): string | undefined {
    const bytes = this.written.get(identifier);
    return bytes ? Buffer.from(bytes).toString('latin1') : undefined;
  }
}
