/**
 * IESNA LM-63 document parser
 *
 * Document layout (all dialects):
 *   [tag line]                    absent in LM-63-1986
 *   label lines...
 *   TILT=<NONE|INCLUDE|name>
 *   [tilt block]                  only for TILT=INCLUDE
 *   <#lamps> <lumens/lamp> <multiplier> <#vert> <#horz> <gonio> <units> <w> <l> <h>
 *   <ballast factor> <ballast-lamp factor> <input watts>
 *   <vertical angles...>
 *   <horizontal angles...>
 *   <candelas...>                 one block of #vert values per horizontal angle
 *
 * Any failure aborts the whole parse; no partial record is returned.
 */

import { ByteCursor } from '../io/byte-cursor.js';
import type { ByteSource } from '../io/byte-source.js';
import { ErrorHandler, StructureError } from '../errors/index.js';
import type { Outcome } from '../errors/index.js';
import { GoniometerType, Units } from '../photometry/types.js';
import type {
  Dimensions,
  ElectricalData,
  PhotometricRecord,
  PhotometryData,
} from '../photometry/types.js';
import { readFields, readFloatArray } from './field-reader.js';
import type { TokenKind } from './field-reader.js';
import { resolveFormat } from './format-resolver.js';
import { readLabelSection } from './label-section.js';
import { resolveTilt } from './tilt-parser.js';

export interface ParseOptions {
  /** Display name stored on the record, typically the file path. */
  name?: string;
  /** Where TILT=<name> resources are fetched from. */
  tiltSource?: ByteSource;
}

const HEADER_FIELDS: readonly TokenKind[] = [
  'int', // number of lamps
  'float', // lumens per lamp
  'float', // candela multiplier
  'int', // number of vertical angles
  'int', // number of horizontal angles
  'int', // goniometer type
  'int', // units
  'float', // width
  'float', // length
  'float', // height
];

const ELECTRICAL_FIELDS: readonly TokenKind[] = ['float', 'float', 'float'];

function toGoniometerType(code: number, line: number): GoniometerType {
  switch (code) {
    case GoniometerType.TypeC:
      return GoniometerType.TypeC;
    case GoniometerType.TypeB:
      return GoniometerType.TypeB;
    case GoniometerType.TypeA:
      return GoniometerType.TypeA;
    default:
      throw new StructureError(`Unknown photometric type ${code}`, { line, field: 'goniometer type' });
  }
}

function toUnits(code: number, line: number): Units {
  switch (code) {
    case Units.Feet:
      return Units.Feet;
    case Units.Meters:
      return Units.Meters;
    default:
      throw new StructureError(`Unknown units type ${code}`, { line, field: 'units' });
  }
}

function requirePositiveCount(count: number, field: string, line: number): void {
  if (count < 1) {
    throw new StructureError(`${field} must be at least 1, got ${count}`, { line, field });
  }
}

export interface PhotometricSection {
  lamp: { count: number; lumensPerLamp: number; multiplier: number };
  units: Units;
  dimensions: Dimensions;
  electrical: ElectricalData;
  photometry: PhotometryData;
}

/**
 * Read everything after the TILT section: the two header lines, both
 * angle arrays and the candela table.
 */
export function parsePhotometry(cursor: ByteCursor): PhotometricSection {
  const [
    lampCount,
    lumensPerLamp,
    multiplier,
    verticalAngleCount,
    horizontalAngleCount,
    goniometerCode,
    unitsCode,
    width,
    length,
    height,
  ] = readFields(cursor, HEADER_FIELDS, 'lamp header');
  const headerLine = cursor.lineNumber;

  const goniometerType = toGoniometerType(goniometerCode, headerLine);
  const units = toUnits(unitsCode, headerLine);
  requirePositiveCount(verticalAngleCount, 'number of vertical angles', headerLine);
  requirePositiveCount(horizontalAngleCount, 'number of horizontal angles', headerLine);

  const [ballastFactor, ballastLampFactor, inputWatts] = readFields(cursor, ELECTRICAL_FIELDS, 'electrical data');

  const verticalAngles = readFloatArray(cursor, verticalAngleCount, 'vertical angles');
  const horizontalAngles = readFloatArray(cursor, horizontalAngleCount, 'horizontal angles');

  const candelas: number[][] = [];
  for (let h = 0; h < horizontalAngleCount; h++) {
    candelas.push(readFloatArray(cursor, verticalAngleCount, `candela values for horizontal angle #${h + 1}`));
  }

  return {
    lamp: { count: lampCount, lumensPerLamp, multiplier },
    units,
    dimensions: { width, length, height },
    electrical: { ballastFactor, ballastLampFactor, inputWatts },
    photometry: {
      goniometerType,
      verticalAngleCount,
      horizontalAngleCount,
      verticalAngles,
      horizontalAngles,
      candelas,
    },
  };
}

/**
 * Parse a complete document. Async only because TILT=<name> fetches a
 * second resource through `options.tiltSource`.
 */
export async function parseIes(bytes: Uint8Array, options: ParseOptions = {}): Promise<PhotometricRecord> {
  const cursor = new ByteCursor(bytes);

  const format = resolveFormat(cursor);
  const { labels, tiltReference } = readLabelSection(cursor);
  const tilt = await resolveTilt(tiltReference, cursor, options.tiltSource);
  const section = parsePhotometry(cursor);

  return {
    file: { name: options.name, format },
    labels,
    lamp: { ...section.lamp, tiltReference, tilt },
    units: section.units,
    dimensions: section.dimensions,
    electrical: section.electrical,
    photometry: section.photometry,
  };
}

/** Parse without throwing: the record on success, the reason on failure. */
export function tryParseIes(bytes: Uint8Array, options: ParseOptions = {}): Promise<Outcome<PhotometricRecord>> {
  return ErrorHandler.wrap(() => parseIes(bytes, options), { name: options.name });
}
