/**
 * Configuration tests
 *
 * ConfigManager: load / save / validate / env overrides / get and set
 * PRESETS: structure validation
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import os from 'os';
import path from 'path';
import fs from 'fs';
import { ConfigurationError } from '../errors/index.js';
import { CONFIG_KEYS, ConfigManager } from './config.js';
import type { IesnaConfig } from './config.js';
import { PRESETS, getPreset, listPresets } from './presets.js';

// ─── Fixtures ─────────────────────────────────────────────────────────────────

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'iesna-config-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function tmpConfigPath(): string {
  return path.join(tmpDir, 'config.json');
}

function makeConfig(overrides: Partial<IesnaConfig> = {}): IesnaConfig {
  return { ...ConfigManager.defaults(), ...overrides };
}

// ─── ConfigManager.load ───────────────────────────────────────────────────────

describe('ConfigManager.load', () => {
  it('returns defaults when the config file does not exist', () => {
    const config = new ConfigManager(tmpConfigPath()).load();
    expect(config).toEqual(ConfigManager.defaults());
  });

  it('merges a partial file over the defaults', () => {
    const configPath = tmpConfigPath();
    fs.writeFileSync(configPath, JSON.stringify({ rescale: { coneAngle: 45 }, batch: { concurrency: 2 } }), 'utf-8');
    const config = new ConfigManager(configPath).load();
    expect(config.rescale).toEqual({ coneAngle: 45, preserveIntensity: false });
    expect(config.batch.concurrency).toBe(2);
    expect(config.output.suffix).toBe('_rescaled');
  });

  it('ignores values of the wrong type', () => {
    const configPath = tmpConfigPath();
    fs.writeFileSync(configPath, JSON.stringify({ rescale: { coneAngle: 'wide' }, cli: { spinner: 'no' } }), 'utf-8');
    const config = new ConfigManager(configPath).load();
    expect(config.rescale.coneAngle).toBe(90);
    expect(config.cli.spinner).toBe(true);
  });

  it('throws ConfigurationError on malformed JSON', () => {
    const configPath = tmpConfigPath();
    fs.writeFileSync(configPath, '{ not json', 'utf-8');
    expect(() => new ConfigManager(configPath).load()).toThrow(ConfigurationError);
  });

  it('throws ConfigurationError when the file is not an object', () => {
    const configPath = tmpConfigPath();
    fs.writeFileSync(configPath, '[1, 2]', 'utf-8');
    expect(() => new ConfigManager(configPath).load()).toThrow('expected a JSON object');
  });
});

// ─── ConfigManager.save ───────────────────────────────────────────────────────

describe('ConfigManager.save', () => {
  it('creates parent directories and writes JSON', () => {
    const configPath = path.join(tmpDir, 'nested', 'dir', 'config.json');
    const mgr = new ConfigManager(configPath);
    mgr.save(makeConfig({ output: { suffix: '_narrow', directory: '/out' } }));
    expect(fs.existsSync(configPath)).toBe(true);
    expect(mgr.load().output).toEqual({ suffix: '_narrow', directory: '/out' });
  });

  it('round-trips every section', () => {
    const mgr = new ConfigManager(tmpConfigPath());
    const config = makeConfig({
      rescale: { coneAngle: 120, preserveIntensity: true },
      serializer: { precision: 4 },
      cli: { spinner: false },
    });
    mgr.save(config);
    expect(mgr.load()).toEqual(config);
  });
});

// ─── ConfigManager.validate ───────────────────────────────────────────────────

describe('ConfigManager.validate', () => {
  const mgr = new ConfigManager('/unused');

  it('accepts the defaults', () => {
    expect(mgr.validate(ConfigManager.defaults())).toEqual({ valid: true, errors: [] });
  });

  it('rejects a cone angle outside 0–180', () => {
    const result = mgr.validate(makeConfig({ rescale: { coneAngle: 200, preserveIntensity: false } }));
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['rescale.coneAngle must be between 0 and 180, got: 200']);
  });

  it('rejects an empty suffix unless an output directory is set', () => {
    expect(mgr.validate(makeConfig({ output: { suffix: '' } })).valid).toBe(false);
    expect(mgr.validate(makeConfig({ output: { suffix: '', directory: 'out' } })).valid).toBe(true);
  });

  it('rejects a fractional precision and a zero concurrency together', () => {
    const result = mgr.validate(makeConfig({ serializer: { precision: 1.5 }, batch: { concurrency: 0 } }));
    expect(result.errors).toHaveLength(2);
  });
});

// ─── ConfigManager.loadWithEnvOverrides ───────────────────────────────────────

describe('ConfigManager.loadWithEnvOverrides', () => {
  it('applies every supported variable', () => {
    const config = new ConfigManager(tmpConfigPath()).loadWithEnvOverrides({
      IESNA_CONE_ANGLE: '60',
      IESNA_PRESERVE_INTENSITY: 'yes',
      IESNA_OUTPUT_SUFFIX: '_60',
      IESNA_OUTPUT_DIR: '/custom/output',
      IESNA_PRECISION: '3',
      IESNA_BATCH_CONCURRENCY: '8',
      IESNA_SPINNER: 'off',
    });
    expect(config).toEqual({
      rescale: { coneAngle: 60, preserveIntensity: true },
      output: { suffix: '_60', directory: '/custom/output' },
      serializer: { precision: 3 },
      batch: { concurrency: 8 },
      cli: { spinner: false },
    });
  });

  it('overrides values from the file', () => {
    const configPath = tmpConfigPath();
    fs.writeFileSync(configPath, JSON.stringify({ rescale: { coneAngle: 30 } }), 'utf-8');
    const config = new ConfigManager(configPath).loadWithEnvOverrides({ IESNA_CONE_ANGLE: '150' });
    expect(config.rescale.coneAngle).toBe(150);
  });

  it('ignores unset variables', () => {
    const config = new ConfigManager(tmpConfigPath()).loadWithEnvOverrides({});
    expect(config).toEqual(ConfigManager.defaults());
  });

  it('rejects malformed values', () => {
    const mgr = new ConfigManager(tmpConfigPath());
    expect(() => mgr.loadWithEnvOverrides({ IESNA_CONE_ANGLE: 'wide' })).toThrow(ConfigurationError);
    expect(() => mgr.loadWithEnvOverrides({ IESNA_SPINNER: 'maybe' })).toThrow('IESNA_SPINNER must be true or false');
  });
});

// ─── getValue / setValue ──────────────────────────────────────────────────────

describe('ConfigManager.getValue / setValue', () => {
  it('reads dotted keys', () => {
    const config = ConfigManager.defaults();
    expect(ConfigManager.getValue(config, 'rescale.coneAngle')).toBe(90);
    expect(ConfigManager.getValue(config, 'output')).toEqual({ suffix: '_rescaled' });
    expect(ConfigManager.getValue(config, 'output.directory')).toBeUndefined();
    expect(ConfigManager.getValue(config, 'rescale.coneAngle.deeper')).toBeUndefined();
  });

  it('coerces raw strings by key', () => {
    let config = ConfigManager.defaults();
    config = ConfigManager.setValue(config, 'rescale.coneAngle', '75');
    config = ConfigManager.setValue(config, 'rescale.preserveIntensity', 'true');
    config = ConfigManager.setValue(config, 'output.directory', 'out');
    expect(config.rescale).toEqual({ coneAngle: 75, preserveIntensity: true });
    expect(config.output.directory).toBe('out');
  });

  it('clears the output directory with an empty value', () => {
    const config = ConfigManager.setValue(makeConfig({ output: { suffix: '_r', directory: 'out' } }), 'output.directory', '');
    expect(config.output.directory).toBeUndefined();
  });

  it('does not modify the input config', () => {
    const config = ConfigManager.defaults();
    ConfigManager.setValue(config, 'batch.concurrency', '2');
    expect(config.batch.concurrency).toBe(4);
  });

  it('accepts every listed key', () => {
    const samples: Record<string, string> = { number: '1', boolean: 'false', string: 'x' };
    for (const [key, kind] of Object.entries(CONFIG_KEYS)) {
      expect(() => ConfigManager.setValue(ConfigManager.defaults(), key, samples[kind])).not.toThrow();
    }
  });

  it('rejects unknown keys and bad values', () => {
    expect(() => ConfigManager.setValue(ConfigManager.defaults(), 'rescale.speed', '1')).toThrow('Unknown config key');
    expect(() => ConfigManager.setValue(ConfigManager.defaults(), 'batch.concurrency', 'many')).toThrow(
      ConfigurationError
    );
  });
});

// ─── ConfigManager.defaults ───────────────────────────────────────────────────

describe('ConfigManager.defaults', () => {
  it('returns a fresh object each call', () => {
    const a = ConfigManager.defaults();
    a.rescale.coneAngle = 10;
    expect(ConfigManager.defaults().rescale.coneAngle).toBe(90);
  });
});

// ─── PRESETS ──────────────────────────────────────────────────────────────────

describe('PRESETS', () => {
  it('has a valid cone angle and a description for every preset', () => {
    for (const preset of Object.values(PRESETS)) {
      expect(preset.coneAngle).toBeGreaterThanOrEqual(0);
      expect(preset.coneAngle).toBeLessThanOrEqual(180);
      expect(preset.description.length).toBeGreaterThan(0);
    }
  });

  it('looks presets up by name', () => {
    expect(getPreset('spot')).toEqual({
      name: 'Spot',
      description: 'Narrow 30° beam; keeps peak intensities.',
      coneAngle: 30,
      preserveIntensity: true,
    });
    expect(getPreset('laser')).toBeUndefined();
    expect(getPreset('toString')).toBeUndefined();
  });

  it('lists every preset name', () => {
    expect(listPresets()).toEqual(['spot', 'narrow-flood', 'flood', 'wide-flood', 'identity']);
  });
});
