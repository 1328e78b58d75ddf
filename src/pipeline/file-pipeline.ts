/**
 * File pipeline
 *
 * Glues the byte collaborators to the core: acquire → parse → rescale →
 * serialize → persist. Every step that fails throws a typed error naming
 * the file involved.
 */

import path from 'path';
import type { ByteSink, ByteSource } from '../io/byte-source.js';
import { ResourceError } from '../errors/index.js';
import { parseIes } from '../parser/ies-parser.js';
import { IesSerializer } from '../serializer/ies-serializer.js';
import type { SerializeOptions } from '../serializer/ies-serializer.js';
import { rescalePhotometry } from '../transform/rescale.js';
import type { PhotometricRecord } from '../photometry/types.js';

export interface RescaleFileOptions {
  coneAngle: number;
  preserveIntensity?: boolean;
}

export interface PipelineOptions extends SerializeOptions {
  /** Source for the TILT=<name> files of a given input. Default: the document source. */
  tiltSourceFor?: (input: string) => ByteSource;
}

export interface PipelineResult {
  input: string;
  output: string;
  record: PhotometricRecord;
  bytesWritten: number;
}

/**
 * Output path for a generated file: `<directory or input dir>/<stem><suffix><ext>`.
 */
export function defaultOutputPath(input: string, suffix: string, directory?: string): string {
  const { dir, name, ext } = path.parse(input);
  return path.join(directory ?? dir, `${name}${suffix}${ext || '.ies'}`);
}

export class IesFilePipeline {
  private readonly serializer: IesSerializer;
  private readonly tiltSourceFor: (input: string) => ByteSource;

  constructor(
    private readonly source: ByteSource,
    private readonly sink: ByteSink,
    options: PipelineOptions = {}
  ) {
    this.serializer = new IesSerializer({ precision: options.precision });
    this.tiltSourceFor = options.tiltSourceFor ?? (() => this.source);
  }

  async load(input: string): Promise<PhotometricRecord> {
    const bytes = await this.source.acquire(input);
    if (!bytes) {
      throw new ResourceError(`IES file "${input}" is missing, unreadable or empty`, { identifier: input });
    }
    return parseIes(bytes, { name: input, tiltSource: this.tiltSourceFor(input) });
  }

  async write(record: PhotometricRecord, output: string): Promise<number> {
    const bytes = this.serializer.serialize(record);
    const ok = await this.sink.persist(output, bytes);
    if (!ok) {
      throw new ResourceError(`Could not write IES file "${output}"`, { identifier: output });
    }
    return bytes.length;
  }

  async rescaleFile(input: string, output: string, options: RescaleFileOptions): Promise<PipelineResult> {
    const original = await this.load(input);
    const scaled = rescalePhotometry(original, options.coneAngle, {
      preserveIntensity: options.preserveIntensity,
    });
    const record: PhotometricRecord = { ...scaled, file: { ...scaled.file, name: output } };
    const bytesWritten = await this.write(record, output);
    return { input, output, record, bytesWritten };
  }

  /** Rewrite a file in canonical form, embedding any external TILT data. */
  async normalizeFile(input: string, output: string): Promise<PipelineResult> {
    const original = await this.load(input);
    const record: PhotometricRecord = { ...original, file: { ...original.file, name: output } };
    const bytesWritten = await this.write(record, output);
    return { input, output, record, bytesWritten };
  }
}
