/**
 * Structural equality for photometric records.
 *
 * The file name is ignored: otherwise identical data read from two
 * different paths compares equal. Numbers compare within a tolerance so
 * that values quantized by the serializer still match their source.
 */

import type { PhotometricRecord, TiltData } from './types.js';

/** Half a unit in the second decimal place, plus float slack. */
export const DEFAULT_TOLERANCE = 0.005 + 1e-9;

function near(a: number, b: number, tolerance: number): boolean {
  return Math.abs(a - b) <= tolerance;
}

function arraysNear(a: number[], b: number[], tolerance: number): boolean {
  return a.length === b.length && a.every((value, i) => near(value, b[i], tolerance));
}

function tiltsEqual(a: TiltData | undefined, b: TiltData | undefined, tolerance: number): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return (
    a.orientation === b.orientation &&
    a.pairCount === b.pairCount &&
    arraysNear(a.angles, b.angles, tolerance) &&
    arraysNear(a.multiplyingFactors, b.multiplyingFactors, tolerance)
  );
}

export function photometricEquals(
  a: PhotometricRecord,
  b: PhotometricRecord,
  tolerance: number = DEFAULT_TOLERANCE
): boolean {
  const pa = a.photometry;
  const pb = b.photometry;
  return (
    a.file.format === b.file.format &&
    a.labels.length === b.labels.length &&
    a.labels.every((label, i) => label === b.labels[i]) &&
    a.lamp.count === b.lamp.count &&
    near(a.lamp.lumensPerLamp, b.lamp.lumensPerLamp, tolerance) &&
    near(a.lamp.multiplier, b.lamp.multiplier, tolerance) &&
    a.lamp.tiltReference === b.lamp.tiltReference &&
    tiltsEqual(a.lamp.tilt, b.lamp.tilt, tolerance) &&
    a.units === b.units &&
    near(a.dimensions.width, b.dimensions.width, tolerance) &&
    near(a.dimensions.length, b.dimensions.length, tolerance) &&
    near(a.dimensions.height, b.dimensions.height, tolerance) &&
    near(a.electrical.ballastFactor, b.electrical.ballastFactor, tolerance) &&
    near(a.electrical.ballastLampFactor, b.electrical.ballastLampFactor, tolerance) &&
    near(a.electrical.inputWatts, b.electrical.inputWatts, tolerance) &&
    pa.goniometerType === pb.goniometerType &&
    pa.verticalAngleCount === pb.verticalAngleCount &&
    pa.horizontalAngleCount === pb.horizontalAngleCount &&
    arraysNear(pa.verticalAngles, pb.verticalAngles, tolerance) &&
    arraysNear(pa.horizontalAngles, pb.horizontalAngles, tolerance) &&
    pa.candelas.length === pb.candelas.length &&
    pa.candelas.every((row, i) => arraysNear(row, pb.candelas[i], tolerance))
  );
}

/** Deep copy sharing no arrays with the input. */
export function clonePhotometricRecord(record: PhotometricRecord): PhotometricRecord {
  const { tilt } = record.lamp;
  return {
    file: { ...record.file },
    labels: [...record.labels],
    lamp: {
      ...record.lamp,
      tilt: tilt
        ? {
            ...tilt,
            angles: [...tilt.angles],
            multiplyingFactors: [...tilt.multiplyingFactors],
          }
        : undefined,
    },
    units: record.units,
    dimensions: { ...record.dimensions },
    electrical: { ...record.electrical },
    photometry: {
      ...record.photometry,
      verticalAngles: [...record.photometry.verticalAngles],
      horizontalAngles: [...record.photometry.horizontalAngles],
      candelas: record.photometry.candelas.map((row) => [...row]),
    },
  };
}
