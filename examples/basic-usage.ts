/**
 * Basic Usage Example
 *
 * Reads an IES file, prints a summary, fits it into a narrower cone and
 * writes the result next to the input.
 *
 *   IESNA_CONE_ANGLE=60 npx tsx examples/basic-usage.ts path/to/lamp.ies
 */

import dotenv from 'dotenv';
import {
  ConfigManager,
  ErrorHandler,
  FileByteSink,
  FileByteSource,
  IesFilePipeline,
  OutputFormatter,
  defaultOutputPath,
} from '../src/index.js';

dotenv.config();

async function main(): Promise<void> {
  const input = process.argv[2];
  if (!input) {
    console.error('Usage: basic-usage <file.ies>');
    process.exitCode = 1;
    return;
  }

  // 1. Settings from ~/.iesna/config.json and IESNA_* variables
  const config = new ConfigManager().loadWithEnvOverrides();

  // 2. Pipeline over the local filesystem, TILT files resolved beside the input
  const pipeline = new IesFilePipeline(new FileByteSource(), new FileByteSink(), {
    precision: config.serializer.precision,
    tiltSourceFor: (file) => FileByteSource.besideFile(file),
  });

  const formatter = new OutputFormatter();

  // 3. Summary of the original
  const record = await pipeline.load(input);
  console.log(formatter.formatSummary(record));

  // 4. Rescale and write
  const output = defaultOutputPath(input, config.output.suffix, config.output.directory);
  const result = await pipeline.rescaleFile(input, output, config.rescale);
  console.log(formatter.formatPipelineResult(result));
}

main().catch((err) => {
  console.error(ErrorHandler.toUserMessage(err));
  process.exitCode = 1;
});
