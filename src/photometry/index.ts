export { IesFormat, TiltOrientation, Units, GoniometerType, TILT_NONE, TILT_INCLUDE } from './types.js';
export type {
  FileInfo,
  TiltData,
  LampData,
  Dimensions,
  ElectricalData,
  PhotometryData,
  PhotometricRecord,
} from './types.js';
export { photometricEquals, clonePhotometricRecord, DEFAULT_TOLERANCE } from './equality.js';
