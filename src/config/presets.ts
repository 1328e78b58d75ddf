/**
 * Rescale presets
 *
 * Named cone angle / mode combinations for common beam shapes.
 */

export interface RescalePreset {
  name: string;
  description: string;
  coneAngle: number;
  preserveIntensity: boolean;
}

export const PRESETS: Record<string, RescalePreset> = {
  spot: {
    name: 'Spot',
    description: 'Narrow 30° beam; keeps peak intensities.',
    coneAngle: 30,
    preserveIntensity: true,
  },

  'narrow-flood': {
    name: 'Narrow Flood',
    description: '60° beam with foreshortened off-axis samples.',
    coneAngle: 60,
    preserveIntensity: false,
  },

  flood: {
    name: 'Flood',
    description: '90° beam with foreshortened off-axis samples.',
    coneAngle: 90,
    preserveIntensity: false,
  },

  'wide-flood': {
    name: 'Wide Flood',
    description: '120° beam; keeps peak intensities.',
    coneAngle: 120,
    preserveIntensity: true,
  },

  identity: {
    name: 'Identity',
    description: 'Full 180° hemisphere. Output matches the input profile.',
    coneAngle: 180,
    preserveIntensity: false,
  },
};

/** Return the preset by name, or undefined. */
export function getPreset(name: string): RescalePreset | undefined {
  return Object.hasOwn(PRESETS, name) ? PRESETS[name] : undefined;
}

/** List all preset names. */
export function listPresets(): string[] {
  return Object.keys(PRESETS);
}
