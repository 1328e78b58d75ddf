import { describe, it, expect, beforeEach } from 'vitest';
import path from 'path';
import { MemoryByteSink, MemoryByteSource } from '../io/byte-source.js';
import type { ByteSink } from '../io/byte-source.js';
import { ResourceError, StructureError, ValidationError } from '../errors/index.js';
import { IesFilePipeline, defaultOutputPath } from './file-pipeline.js';

const PROFILE = [
  'IESNA91',
  'TILT=beam.tlt',
  '1 500 1 2 1 1 1 0 0 0',
  '1 1 5',
  '0 90',
  '0',
  '200 100',
  '',
].join('\n');

describe('defaultOutputPath', () => {
  it('appends the suffix to the stem', () => {
    expect(defaultOutputPath(path.join('a', 'lamp.ies'), '_rescaled')).toBe(path.join('a', 'lamp_rescaled.ies'));
  });

  it('keeps the original extension', () => {
    expect(defaultOutputPath('lamp.IES', '_n')).toBe('lamp_n.IES');
  });

  it('adds .ies when the input has no extension', () => {
    expect(defaultOutputPath('lamp', '_n')).toBe('lamp_n.ies');
  });

  it('writes into the configured directory', () => {
    expect(defaultOutputPath(path.join('a', 'lamp.ies'), '', 'out')).toBe(path.join('out', 'lamp.ies'));
  });
});

describe('IesFilePipeline', () => {
  let source: MemoryByteSource;
  let sink: MemoryByteSink;
  let pipeline: IesFilePipeline;

  beforeEach(() => {
    source = new MemoryByteSource({ 'lamp.ies': PROFILE, 'beam.tlt': '3\n1\n10\n0.8\n' });
    sink = new MemoryByteSink();
    pipeline = new IesFilePipeline(source, sink);
  });

  it('loads a record named after its input', async () => {
    const record = await pipeline.load('lamp.ies');
    expect(record.file.name).toBe('lamp.ies');
    expect(record.lamp.tilt?.multiplyingFactors).toEqual([0.8]);
  });

  it('fetches TILT files from the source chosen per input', async () => {
    const tilts = new MemoryByteSource({ 'beam.tlt': '1\n0\n' });
    const requested: string[] = [];
    pipeline = new IesFilePipeline(source, sink, {
      tiltSourceFor: (input) => {
        requested.push(input);
        return tilts;
      },
    });
    const record = await pipeline.load('lamp.ies');
    expect(requested).toEqual(['lamp.ies']);
    expect(record.lamp.tilt?.pairCount).toBe(0);
  });

  it('rejects a missing input', async () => {
    await expect(pipeline.load('nope.ies')).rejects.toThrow(ResourceError);
  });

  it('propagates parse failures', async () => {
    source.set('broken.ies', 'IESNA91\nTILT=NONE\n');
    await expect(pipeline.load('broken.ies')).rejects.toThrow(StructureError);
  });

  it('rescales and writes the result', async () => {
    const result = await pipeline.rescaleFile('lamp.ies', 'narrow.ies', { coneAngle: 90, preserveIntensity: true });
    expect(result.record.file.name).toBe('narrow.ies');
    expect(result.bytesWritten).toBe(sink.written.get('narrow.ies')?.length);
    expect(sink.text('narrow.ies')).toBe(
      [
        'IESNA91',
        'TILT=INCLUDE',
        '3',
        '1',
        '10',
        '0.8',
        '1 500 1 2 1 1 1 0 0 0',
        '1 1 5',
        '0 90',
        '0',
        '200 70.71',
        '',
      ].join('\n')
    );
  });

  it('writes nothing for an invalid cone angle', async () => {
    await expect(pipeline.rescaleFile('lamp.ies', 'out.ies', { coneAngle: -5 })).rejects.toThrow(ValidationError);
    expect(sink.written.size).toBe(0);
  });

  it('normalizes without changing the photometry', async () => {
    const result = await pipeline.normalizeFile('lamp.ies', 'lamp_normalized.ies');
    expect(result.record.photometry.candelas).toEqual([[200, 100]]);
    expect(sink.text('lamp_normalized.ies')?.split('\n')[1]).toBe('TILT=INCLUDE');
  });

  it('reports a sink that refuses the write', async () => {
    const refusing: ByteSink = { persist: async () => false };
    pipeline = new IesFilePipeline(source, refusing);
    await expect(pipeline.normalizeFile('lamp.ies', 'x.ies')).rejects.toThrow('Could not write IES file "x.ies"');
  });

  it('writes with the configured precision', async () => {
    pipeline = new IesFilePipeline(source, sink, { precision: 4 });
    await pipeline.rescaleFile('lamp.ies', 'p4.ies', { coneAngle: 90 });
    expect(sink.text('p4.ies')?.split('\n')[10]).toBe('200 70.7107');
  });
});
