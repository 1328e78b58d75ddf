export {
  rescalePhotometry,
  tryRescale,
  rescaleSample,
  rescaleFactors,
  assertConeAngle,
  MIN_CONE_ANGLE,
  MAX_CONE_ANGLE,
  HORIZONTAL_BAND_DEGREES,
} from './rescale.js';
export type { RescaleOptions, RescaledSample } from './rescale.js';
