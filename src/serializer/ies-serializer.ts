/**
 * IESNA LM-63 serializer, the structural inverse of the parser.
 *
 * Output is canonical: LF line endings, single spaces, every array on one
 * line, floats trimmed by formatFloat. Any TILT reference other than NONE
 * is written as TILT=INCLUDE followed by the tilt block, so records read
 * from an external TILT file come out self-contained.
 */

import { ErrorHandler, SerializationError } from '../errors/index.js';
import type { Outcome } from '../errors/index.js';
import { IesFormat, TILT_INCLUDE, TILT_NONE } from '../photometry/types.js';
import type { PhotometricRecord } from '../photometry/types.js';
import { formatFloat, formatInt } from './float-format.js';

export interface SerializeOptions {
  /** Decimal places before trimming. Default: 2 */
  precision?: number;
}

export function formatTag(format: IesFormat): string {
  switch (format) {
    case IesFormat.LM63_1986:
      return 'IESNA86';
    case IesFormat.LM63_1991:
      return 'IESNA91';
    case IesFormat.LM63_1995:
      return 'IESNA:LM-63-1995';
    case IesFormat.LM63_2002:
      return 'IESNA:LM-63-2002';
    default:
      throw new SerializationError(`Unknown file format "${String(format)}"`, { format });
  }
}

export class IesSerializer {
  private readonly precision: number;

  constructor(options: SerializeOptions = {}) {
    this.precision = options.precision ?? 2;
    if (!Number.isInteger(this.precision) || this.precision < 0 || this.precision > 20) {
      throw new SerializationError(`precision must be an integer in [0, 20], got ${this.precision}`);
    }
  }

  /** Serialize to text, one entry per output line. */
  toLines(record: PhotometricRecord): string[] {
    const f = (value: number): string => formatFloat(value, this.precision);
    const floats = (values: number[]): string => values.map(f).join(' ');
    const { lamp, dimensions, electrical, photometry } = record;

    const lines: string[] = [formatTag(record.file.format), ...record.labels];

    if (lamp.tiltReference === TILT_NONE) {
      lines.push(`TILT=${TILT_NONE}`);
    } else {
      const { tilt } = lamp;
      if (!tilt) {
        throw new SerializationError(`TILT=${lamp.tiltReference} record carries no tilt data`, {
          tiltReference: lamp.tiltReference,
        });
      }
      lines.push(`TILT=${TILT_INCLUDE}`);
      lines.push(formatInt(tilt.orientation));
      lines.push(formatInt(tilt.pairCount));
      if (tilt.pairCount > 0) {
        lines.push(floats(tilt.angles));
        lines.push(floats(tilt.multiplyingFactors));
      }
    }

    lines.push(
      [
        formatInt(lamp.count),
        f(lamp.lumensPerLamp),
        f(lamp.multiplier),
        formatInt(photometry.verticalAngleCount),
        formatInt(photometry.horizontalAngleCount),
        formatInt(photometry.goniometerType),
        formatInt(record.units),
        f(dimensions.width),
        f(dimensions.length),
        f(dimensions.height),
      ].join(' ')
    );
    lines.push([electrical.ballastFactor, electrical.ballastLampFactor, electrical.inputWatts].map(f).join(' '));
    lines.push(floats(photometry.verticalAngles));
    lines.push(floats(photometry.horizontalAngles));
    for (const row of photometry.candelas) {
      lines.push(floats(row));
    }

    return lines;
  }

  toText(record: PhotometricRecord): string {
    return this.toLines(record).map((line) => `${line}\n`).join('');
  }

  serialize(record: PhotometricRecord): Uint8Array {
    return Buffer.from(this.toText(record), 'latin1');
  }
}

export function serializeIes(record: PhotometricRecord, options: SerializeOptions = {}): Uint8Array {
  return new IesSerializer(options).serialize(record);
}

/** Serialize without throwing. */
export function trySerializeIes(record: PhotometricRecord, options: SerializeOptions = {}): Outcome<Uint8Array> {
  return ErrorHandler.attempt(() => serializeIes(record, options), { name: record.file.name });
}
