/**
 * TILT data: lamp output as a function of tilt angle.
 *
 *   <orientation>             1 | 2 | 3
 *   <pair count>
 *   <angles...>               pair count floats, may wrap
 *   <multiplying factors...>  pair count floats, may wrap
 *
 * The block follows the TILT=INCLUDE line, or makes up a separate
 * resource named by TILT=<name>.
 */

import { ByteCursor } from '../io/byte-cursor.js';
import type { ByteSource } from '../io/byte-source.js';
import { NumericFormatError, ResourceError, StructureError } from '../errors/index.js';
import { TILT_INCLUDE, TILT_NONE, TiltOrientation } from '../photometry/types.js';
import type { TiltData } from '../photometry/types.js';
import { readFields, readFloatArray } from './field-reader.js';

function toOrientation(code: number, line: number): TiltOrientation {
  switch (code) {
    case TiltOrientation.LampVertical:
      return TiltOrientation.LampVertical;
    case TiltOrientation.LampHorizontal:
      return TiltOrientation.LampHorizontal;
    case TiltOrientation.LampTilted:
      return TiltOrientation.LampTilted;
    default:
      throw new StructureError(`Unknown lamp-to-luminaire geometry ${code}`, { line, field: 'tilt orientation' });
  }
}

export function parseTilt(cursor: ByteCursor): TiltData {
  const [orientationCode] = readFields(cursor, ['int'], 'tilt orientation');
  const orientation = toOrientation(orientationCode, cursor.lineNumber);
  const [pairCount] = readFields(cursor, ['int'], 'tilt pair count');

  if (pairCount <= 0) {
    return { orientation, pairCount, angles: [], multiplyingFactors: [] };
  }

  const angles = readFloatArray(cursor, pairCount, 'tilt angles');
  const multiplyingFactors = readFloatArray(cursor, pairCount, 'tilt multiplying factors');
  return { orientation, pairCount, angles, multiplyingFactors };
}

/**
 * Interpret the TILT= value. Returns undefined for NONE, otherwise the
 * parsed block, read inline or from the named resource.
 */
export async function resolveTilt(
  reference: string,
  cursor: ByteCursor,
  source?: ByteSource
): Promise<TiltData | undefined> {
  if (reference === TILT_NONE) {
    return undefined;
  }
  if (reference === TILT_INCLUDE) {
    return parseTilt(cursor);
  }

  if (!source) {
    throw new ResourceError(`No byte source available to open TILT file "${reference}"`, {
      identifier: reference,
    });
  }
  const bytes = await source.acquire(reference);
  if (!bytes) {
    throw new ResourceError(`TILT file "${reference}" is missing, unreadable or empty`, {
      identifier: reference,
    });
  }

  try {
    return parseTilt(new ByteCursor(bytes));
  } catch (err) {
    if (err instanceof StructureError) {
      throw new StructureError(`${err.message} (TILT file "${reference}")`, {
        ...err.context,
        identifier: reference,
      });
    }
    if (err instanceof NumericFormatError) {
      throw new NumericFormatError(`${err.message} (TILT file "${reference}")`, {
        ...err.context,
        identifier: reference,
      });
    }
    throw err;
  }
}
