/**
 * Type definitions for IESNA LM-63 photometric data
 *
 * A PhotometricRecord is built once by the parser and never mutated;
 * the rescale transform returns a fresh record.
 *
 * Reference: ANSI/IESNA LM-63 "IES Standard File Format for the Electronic
 * Transfer of Photometric Data and Related Information" (1986, 1991, 1995, 2002).
 */

export enum IesFormat {
  LM63_1986 = 'LM-63-1986',
  LM63_1991 = 'LM-63-1991',
  LM63_1995 = 'LM-63-1995',
  LM63_2002 = 'LM-63-2002',
}

/** Lamp-to-luminaire geometry of the TILT table. */
export enum TiltOrientation {
  LampVertical = 1,
  LampHorizontal = 2,
  LampTilted = 3,
}

export enum Units {
  Feet = 1,
  Meters = 2,
}

export enum GoniometerType {
  TypeC = 1,
  TypeB = 2,
  TypeA = 3,
}

/** Reference value meaning "no TILT data". */
export const TILT_NONE = 'NONE';
/** Reference value meaning "TILT data follows in the same document". */
export const TILT_INCLUDE = 'INCLUDE';

export interface FileInfo {
  /** Display name, usually the path the record was read from. */
  name?: string;
  format: IesFormat;
}

export interface TiltData {
  orientation: TiltOrientation;
  pairCount: number;
  angles: number[];
  multiplyingFactors: number[];
}

export interface LampData {
  count: number;
  lumensPerLamp: number;
  /** Candela multiplying factor */
  multiplier: number;
  /** Raw value after "TILT=": NONE, INCLUDE or a resource name. */
  tiltReference: string;
  /** Absent when tiltReference is NONE. */
  tilt?: TiltData;
}

/** Luminous opening dimensions */
export interface Dimensions {
  width: number;
  length: number;
  height: number;
}

export interface ElectricalData {
  ballastFactor: number;
  /** Ballast-lamp photometric factor */
  ballastLampFactor: number;
  inputWatts: number;
}

export interface PhotometryData {
  goniometerType: GoniometerType;
  verticalAngleCount: number;
  horizontalAngleCount: number;
  verticalAngles: number[];
  horizontalAngles: number[];
  /** candelas[h][v]: one row per horizontal angle, one value per vertical angle. */
  candelas: number[][];
}

export interface PhotometricRecord {
  file: FileInfo;
  labels: string[];
  lamp: LampData;
  units: Units;
  dimensions: Dimensions;
  electrical: ElectricalData;
  photometry: PhotometryData;
}
