/**
 * ByteCursor and byte collaborator tests
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import os from 'os';
import fs from 'fs';
import path from 'path';
import { ByteCursor } from './byte-cursor.js';
import { FileByteSink, FileByteSource, MemoryByteSink, MemoryByteSource } from './byte-source.js';

// ─── ByteCursor ──────────────────────────────────────────────────────────────

describe('ByteCursor', () => {
  it('splits on LF and strips a trailing CR', () => {
    const cursor = ByteCursor.fromText('a\r\nb\n\nc');
    expect(cursor.nextLine()).toBe('a');
    expect(cursor.nextLine()).toBe('b');
    expect(cursor.nextLine()).toBe('');
    expect(cursor.nextLine()).toBe('c');
    expect(cursor.nextLine()).toBeUndefined();
  });

  it('reports end of input after a final newline', () => {
    const cursor = ByteCursor.fromText('only\n');
    expect(cursor.nextLine()).toBe('only');
    expect(cursor.atEnd).toBe(true);
    expect(cursor.nextLine()).toBeUndefined();
  });

  it('returns undefined for an empty buffer', () => {
    expect(new ByteCursor(new Uint8Array(0)).nextLine()).toBeUndefined();
  });

  it('strips only one CR', () => {
    const cursor = ByteCursor.fromText('x\r\r\n');
    expect(cursor.nextLine()).toBe('x\r');
  });

  it('counts lines and resets on rewind', () => {
    const cursor = ByteCursor.fromText('one\ntwo\n');
    expect(cursor.lineNumber).toBe(0);
    cursor.nextLine();
    cursor.nextLine();
    expect(cursor.lineNumber).toBe(2);
    cursor.rewind();
    expect(cursor.lineNumber).toBe(0);
    expect(cursor.nextLine()).toBe('one');
  });

  it('decodes every byte value as latin1', () => {
    const cursor = new ByteCursor(Uint8Array.from([0x41, 0xb0, 0xe9, 0x0a]));
    const line = cursor.nextLine();
    expect(line).toBe('A°é');
    expect(Buffer.from(line ?? '', 'latin1')).toEqual(Buffer.from([0x41, 0xb0, 0xe9]));
  });

  it('reads from a subarray view without leaking surrounding bytes', () => {
    const backing = Buffer.from('xxhello\nworldyy', 'latin1');
    const cursor = new ByteCursor(backing.subarray(2, 13));
    expect(cursor.nextLine()).toBe('hello');
    expect(cursor.nextLine()).toBe('world');
    expect(cursor.nextLine()).toBeUndefined();
  });
});

// ─── Memory collaborators ────────────────────────────────────────────────────

describe('MemoryByteSource / MemoryByteSink', () => {
  it('returns stored bytes and undefined for missing or empty entries', async () => {
    const source = new MemoryByteSource({ 'a.ies': 'abc', 'empty.ies': '' });
    expect(Buffer.from((await source.acquire('a.ies')) ?? []).toString()).toBe('abc');
    expect(await source.acquire('empty.ies')).toBeUndefined();
    expect(await source.acquire('missing.ies')).toBeUndefined();
  });

  it('keeps written bytes and refuses an empty identifier', async () => {
    const sink = new MemoryByteSink();
    expect(await sink.persist('out.ies', Buffer.from('data'))).toBe(true);
    expect(await sink.persist('', Buffer.from('data'))).toBe(false);
    expect(sink.text('out.ies')).toBe('data');
    expect(sink.text('other.ies')).toBeUndefined();
  });
});

// ─── File collaborators ──────────────────────────────────────────────────────

describe('FileByteSource / FileByteSink', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'iesna-io-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads files relative to its base directory', async () => {
    fs.writeFileSync(path.join(dir, 'a.tlt'), '1\n0\n');
    const source = new FileByteSource(dir);
    const bytes = await source.acquire('a.tlt');
    expect(Buffer.from(bytes ?? []).toString()).toBe('1\n0\n');
  });

  it('resolves names next to a given file', async () => {
    fs.writeFileSync(path.join(dir, 'lamp.tlt'), '2\n0\n');
    const source = FileByteSource.besideFile(path.join(dir, 'profile.ies'));
    expect(await source.acquire('lamp.tlt')).toBeDefined();
  });

  it('returns undefined for missing, empty, unnamed or directory resources', async () => {
    fs.writeFileSync(path.join(dir, 'empty.ies'), '');
    const source = new FileByteSource(dir);
    expect(await source.acquire('missing.ies')).toBeUndefined();
    expect(await source.acquire('empty.ies')).toBeUndefined();
    expect(await source.acquire('')).toBeUndefined();
    expect(await source.acquire('.')).toBeUndefined();
  });

  it('writes files, creating parent directories', async () => {
    const sink = new FileByteSink(dir);
    expect(await sink.persist('nested/out.ies', Buffer.from('x\n'))).toBe(true);
    expect(fs.readFileSync(path.join(dir, 'nested', 'out.ies'), 'utf-8')).toBe('x\n');
  });

  it('reports failure for an empty name or an unwritable target', async () => {
    fs.mkdirSync(path.join(dir, 'taken'));
    const sink = new FileByteSink(dir);
    expect(await sink.persist('', Buffer.from('x'))).toBe(false);
    expect(await sink.persist('taken', Buffer.from('x'))).toBe(false);
  });
});
