/**
 * Vertical-angle rescaling
 *
 * Fits an emission profile measured over a full hemisphere into a narrower
 * cone. Each candela sample is projected onto the vertical (y) and
 * horizontal (x) axes, the x component is scaled by sin(cone / 2), and the
 * sample is rebuilt from the scaled components. A cone of 180° leaves the
 * profile unchanged; a cone of 0° squashes it onto the vertical axis.
 *
 * Samples above the horizon (vertical angle > 90°) are mirrored into the
 * lower hemisphere, transformed, then mirrored back.
 *
 * Two modes:
 * - default: the magnitude is recomputed from the scaled components, which
 *   foreshortens off-axis samples and keeps the profile's shape.
 * - preserve intensity: the original candela value stays the hypotenuse, so
 *   samples keep their intensity and are swung towards the axis. Samples
 *   within 1° of horizontal keep their angle and take the scaled x
 *   component as magnitude.
 *
 * Vertical angles are a single axis shared by every horizontal row, and
 * each processed cell writes its angle back to that axis: when rows
 * disagree for an index the last row processed wins. Cells with a candela
 * value ≤ 0 are skipped and write nothing.
 */

import { ErrorHandler, ValidationError } from '../errors/index.js';
import type { Outcome } from '../errors/index.js';
import { clonePhotometricRecord } from '../photometry/equality.js';
import type { PhotometricRecord } from '../photometry/types.js';

export const MIN_CONE_ANGLE = 0;
export const MAX_CONE_ANGLE = 180;

/** Samples this close to 90° are treated as horizontal. */
export const HORIZONTAL_BAND_DEGREES = 1;

export interface RescaleOptions {
  /** Keep candela magnitudes instead of recomputing them. Default: false */
  preserveIntensity?: boolean;
}

export interface RescaledSample {
  angle: number;
  candela: number;
}

const DEG_TO_RAD = Math.PI / 180;
const RAD_TO_DEG = 180 / Math.PI;

export function assertConeAngle(coneAngle: number): void {
  if (!Number.isFinite(coneAngle) || coneAngle < MIN_CONE_ANGLE || coneAngle > MAX_CONE_ANGLE) {
    throw new ValidationError(
      `Cone angle must be between ${MIN_CONE_ANGLE} and ${MAX_CONE_ANGLE} degrees, got ${coneAngle}`,
      { coneAngle }
    );
  }
}

/**
 * Per-call constants: the x scale factor and the |cos| threshold of the
 * near-horizontal band.
 */
export function rescaleFactors(coneAngle: number): { xScale: number; horizontalThreshold: number } {
  assertConeAngle(coneAngle);
  return {
    xScale: Math.sin(coneAngle * 0.5 * DEG_TO_RAD),
    horizontalThreshold: Math.abs(Math.cos((90 + HORIZONTAL_BAND_DEGREES) * DEG_TO_RAD)),
  };
}

/**
 * Rescale a single positive sample at `verticalAngle` degrees.
 */
export function rescaleSample(
  candela: number,
  verticalAngle: number,
  xScale: number,
  horizontalThreshold: number,
  preserveIntensity: boolean
): RescaledSample {
  const upper = verticalAngle > 90;
  const folded = upper ? 180 - verticalAngle : verticalAngle;
  const foldedRad = folded * DEG_TO_RAD;

  const y = candela * Math.cos(foldedRad);
  const x = candela * Math.sin(foldedRad);
  const xScaled = x * xScale;
  const nearHorizontal = Math.abs(Math.cos(foldedRad)) <= horizontalThreshold;

  let angle: number;
  let magnitude: number;
  if (!preserveIntensity) {
    angle = nearHorizontal ? folded : Math.atan(xScaled / y) * RAD_TO_DEG;
    magnitude = Math.sqrt(y * y + xScaled * xScaled);
  } else {
    angle = nearHorizontal ? folded : Math.asin(xScaled / candela) * RAD_TO_DEG;
    magnitude = nearHorizontal ? xScaled : candela;
  }

  return { angle: upper ? 180 - angle : angle, candela: magnitude };
}

/**
 * Return a new record whose vertical angles and candela values are fitted
 * into `coneAngle` degrees. The input record is not modified.
 */
export function rescalePhotometry(
  record: PhotometricRecord,
  coneAngle: number,
  options: RescaleOptions = {}
): PhotometricRecord {
  const { xScale, horizontalThreshold } = rescaleFactors(coneAngle);
  const preserveIntensity = options.preserveIntensity ?? false;

  const source = record.photometry;
  const scaled = clonePhotometricRecord(record);
  const target = scaled.photometry;

  for (let h = 0; h < source.horizontalAngleCount; h++) {
    const row = source.candelas[h];
    for (let v = 0; v < source.verticalAngleCount; v++) {
      const candela = row[v];
      if (candela <= 0) {
        continue;
      }
      const sample = rescaleSample(candela, source.verticalAngles[v], xScale, horizontalThreshold, preserveIntensity);
      target.verticalAngles[v] = sample.angle;
      target.candelas[h][v] = sample.candela;
    }
  }

  return scaled;
}

/** Rescale without throwing. */
export function tryRescale(
  record: PhotometricRecord,
  coneAngle: number,
  options: RescaleOptions = {}
): Outcome<PhotometricRecord> {
  return ErrorHandler.attempt(() => rescalePhotometry(record, coneAngle, options), { coneAngle });
}
