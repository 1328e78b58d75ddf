/**
 * iesna CLI
 *
 * Commands:
 *   iesna info <file>
 *   iesna rescale <input> [output] [--angle 90] [--preset spot] [--preserve-intensity]
 *   iesna normalize <input> [output]
 *   iesna batch <inputs...> [--angle 90] [--preset spot] [--preserve-intensity]
 *   iesna presets
 *   iesna config get|set|validate|reset
 */

import { Command } from 'commander';
import { ConfigManager } from '../config/config.js';
import type { IesnaConfig } from '../config/config.js';
import { PRESETS, getPreset } from '../config/presets.js';
import { ConfigurationError } from '../errors/index.js';
import { FileByteSink, FileByteSource } from '../io/byte-source.js';
import { IesFilePipeline, defaultOutputPath } from '../pipeline/file-pipeline.js';
import { BatchProcessor } from './batch-processor.js';
import { OutputFormatter } from './formatter.js';
import { ProgressReporter } from './progress.js';

interface Spinner {
  stop: (symbol?: string, text?: string) => void;
}

// Spinner factory; ora is imported lazily.
async function spinner(text: string, enabled: boolean): Promise<Spinner> {
  if (!enabled) {
    return { stop: () => {} };
  }
  try {
    const { default: ora } = await import('ora');
    const s = ora(text).start();
    return {
      stop: (symbol?: string, text?: string) => {
        if (symbol === '✓') {
          s.succeed(text);
        } else if (symbol === '✗') {
          s.fail(text);
        } else {
          s.stop();
        }
      },
    };
  } catch {
    // Fallback for environments without ora
    process.stdout.write(`${text}...\n`);
    return { stop: () => {} };
  }
}

interface RescaleCommandOptions {
  angle?: string;
  preset?: string;
  preserveIntensity?: boolean;
}

export class IesnaCLI {
  private readonly program: Command;
  private readonly formatter: OutputFormatter;
  private readonly configManager: ConfigManager;

  constructor(
    configManager: ConfigManager = new ConfigManager(),
    formatter: OutputFormatter = new OutputFormatter()
  ) {
    this.configManager = configManager;
    this.formatter = formatter;
    this.program = this.buildProgram();
  }

  /** Parse argv and execute the matching command. */
  async run(argv: string[]): Promise<void> {
    await this.program.parseAsync(argv);
  }

  // ─── Program builder ──────────────────────────────────────────────────────

  private buildProgram(): Command {
    const program = new Command('iesna')
      .version('0.1.0', '-V, --version', 'Print version')
      .description('Parse, normalize and rescale IESNA LM-63 photometric files');

    // ── info ───────────────────────────────────────────────────────────────
    program
      .command('info <file>')
      .description('Print a summary of an IES file')
      .action(async (file: string) => {
        try {
          const config = this.configManager.loadWithEnvOverrides();
          const record = await this.createPipeline(config).load(file);
          console.log(this.formatter.formatSummary(record));
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // ── rescale ────────────────────────────────────────────────────────────
    program
      .command('rescale <input> [output]')
      .description('Fit the vertical emission profile into a narrower cone')
      .option('-a, --angle <degrees>', 'Target cone angle in degrees (0–180)')
      .option('-p, --preset <name>', 'Use a named rescale preset (see `iesna presets`)')
      .option('--preserve-intensity', 'Keep candela magnitudes instead of recomputing them')
      .action(async (input: string, output: string | undefined, opts: RescaleCommandOptions) => {
        let spin: Spinner = { stop: () => {} };
        try {
          const config = this.configManager.loadWithEnvOverrides();
          const settings = this.resolveRescale(config, opts);
          const target = output ?? defaultOutputPath(input, config.output.suffix, config.output.directory);
          spin = await spinner(`Rescaling ${input} to ${settings.coneAngle}°`, config.cli.spinner);
          const result = await this.createPipeline(config).rescaleFile(input, target, settings);
          spin.stop('✓', 'Rescaled');
          console.log(this.formatter.formatPipelineResult(result));
        } catch (err) {
          spin.stop('✗', 'Rescale failed');
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // ── normalize ──────────────────────────────────────────────────────────
    program
      .command('normalize <input> [output]')
      .description('Rewrite an IES file in canonical form with TILT data embedded')
      .action(async (input: string, output: string | undefined) => {
        try {
          const config = this.configManager.loadWithEnvOverrides();
          const target = output ?? defaultOutputPath(input, '_normalized', config.output.directory);
          const result = await this.createPipeline(config).normalizeFile(input, target);
          console.log(this.formatter.formatPipelineResult(result));
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // ── batch ──────────────────────────────────────────────────────────────
    program
      .command('batch <inputs...>')
      .description('Rescale several IES files')
      .option('-a, --angle <degrees>', 'Target cone angle in degrees (0–180)')
      .option('-p, --preset <name>', 'Use a named rescale preset')
      .option('--preserve-intensity', 'Keep candela magnitudes instead of recomputing them')
      .action(async (inputs: string[], opts: RescaleCommandOptions) => {
        try {
          const config = this.configManager.loadWithEnvOverrides();
          const settings = this.resolveRescale(config, opts);
          const processor = new BatchProcessor(
            this.createPipeline(config),
            new ProgressReporter(),
            config.batch.concurrency
          );
          const results = await processor.processBatch(
            inputs.map((input) => ({
              input,
              output: defaultOutputPath(input, config.output.suffix, config.output.directory),
              ...settings,
            }))
          );
          console.log(this.formatter.formatBatchResults(results));
          if (results.some((r) => !r.success)) {
            process.exitCode = 1;
          }
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // ── presets ────────────────────────────────────────────────────────────
    program
      .command('presets')
      .description('List rescale presets')
      .action(() => {
        console.log(this.formatter.formatPresets(PRESETS));
      });

    program.addCommand(this.buildConfigCommand());

    return program;
  }

  private buildConfigCommand(): Command {
    const cmd = new Command('config').description('Manage iesna configuration');

    // config get [key]
    cmd
      .command('get [key]')
      .description('Show full config or a specific key')
      .action((key?: string) => {
        try {
          const config = this.configManager.loadWithEnvOverrides();
          if (key) {
            const value = ConfigManager.getValue(config, key);
            console.log(value !== undefined ? JSON.stringify(value, null, 2) : `Key not found: ${key}`);
          } else {
            console.log(JSON.stringify(config, null, 2));
          }
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // config set <key> <value>
    cmd
      .command('set <key> <value>')
      .description('Set a configuration key')
      .action((key: string, value: string) => {
        try {
          const config = ConfigManager.setValue(this.configManager.load(), key, value);
          const { valid, errors } = this.configManager.validate(config);
          if (!valid) {
            throw new ConfigurationError(errors.join('; '), { key });
          }
          this.configManager.save(config);
          console.log(`✅ Set ${key} = ${value}`);
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // config validate
    cmd
      .command('validate')
      .description('Validate the current configuration')
      .action(() => {
        try {
          const config = this.configManager.loadWithEnvOverrides();
          const { valid, errors } = this.configManager.validate(config);
          if (valid) {
            console.log('✅ Configuration is valid');
          } else {
            console.error('❌ Configuration has errors:');
            for (const err of errors) {
              console.error(`  - ${err}`);
            }
            process.exitCode = 1;
          }
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    // config reset
    cmd
      .command('reset')
      .description('Reset configuration to defaults')
      .action(() => {
        try {
          this.configManager.save(ConfigManager.defaults());
          console.log('✅ Configuration reset to defaults');
        } catch (err) {
          console.error(this.formatter.formatError(err));
          process.exitCode = 1;
        }
      });

    return cmd;
  }

  /** Command-line flags win over the preset, the preset over the config file. */
  private resolveRescale(
    config: IesnaConfig,
    opts: RescaleCommandOptions
  ): { coneAngle: number; preserveIntensity: boolean } {
    const preset = opts.preset !== undefined ? getPreset(opts.preset) : undefined;
    if (opts.preset !== undefined && !preset) {
      throw new ConfigurationError(`Unknown preset: ${opts.preset}`, { preset: opts.preset });
    }
    return {
      coneAngle: opts.angle !== undefined ? Number(opts.angle) : preset?.coneAngle ?? config.rescale.coneAngle,
      preserveIntensity: opts.preserveIntensity ?? preset?.preserveIntensity ?? config.rescale.preserveIntensity,
    };
  }

  // ─── Service adapters (swappable for testing) ─────────────────────────────

  protected createPipeline(config: IesnaConfig): IesFilePipeline {
    return new IesFilePipeline(new FileByteSource(), new FileByteSink(), {
      precision: config.serializer.precision,
      tiltSourceFor: (input) => FileByteSource.besideFile(input),
    });
  }
}
