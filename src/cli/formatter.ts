/**
 * Output Formatter
 *
 * Formats records and results into human-readable strings for CLI output.
 */

import { IesError, ErrorHandler } from '../errors/index.js';
import { GoniometerType, TiltOrientation, Units } from '../photometry/types.js';
import type { PhotometricRecord } from '../photometry/types.js';
import type { PipelineResult } from '../pipeline/file-pipeline.js';
import type { RescalePreset } from '../config/presets.js';
import { formatFloat } from '../serializer/float-format.js';
import type { BatchResult } from './batch-processor.js';

const LINE = '─'.repeat(60);
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const RESET = '\x1b[0m';

function header(title: string): string {
  return `\n${BOLD}${title}${RESET}\n${LINE}`;
}

function field(label: string, value: string | number | undefined): string {
  if (value === undefined) return '';
  return `  ${DIM}${label.padEnd(22)}${RESET}${value}`;
}

function range(values: number[]): string {
  if (!values.length) return '-';
  return `${formatFloat(values[0])}° … ${formatFloat(values[values.length - 1])}°`;
}

export class OutputFormatter {
  /**
   * Summarize a parsed record.
   */
  formatSummary(record: PhotometricRecord): string {
    const { lamp, photometry, electrical, dimensions } = record;
    const peak = photometry.candelas.reduce((max, row) => Math.max(max, ...row), 0);

    const lines: string[] = [header(record.file.name ?? 'IES profile')];
    lines.push(field('Format', record.file.format));
    lines.push(field('Labels', record.labels.length));
    lines.push(field('Lamps', `${lamp.count} × ${formatFloat(lamp.lumensPerLamp)} lm`));
    lines.push(field('Multiplier', formatFloat(lamp.multiplier)));
    if (lamp.tilt) {
      lines.push(
        field('TILT', `${lamp.tiltReference} (${TiltOrientation[lamp.tilt.orientation]}, ${lamp.tilt.pairCount} pairs)`)
      );
    } else {
      lines.push(field('TILT', lamp.tiltReference));
    }
    lines.push(field('Photometry', GoniometerType[photometry.goniometerType]));
    lines.push(field('Units', Units[record.units]));
    lines.push(
      field(
        'Opening',
        `${formatFloat(dimensions.width)} × ${formatFloat(dimensions.length)} × ${formatFloat(dimensions.height)}`
      )
    );
    lines.push(field('Input watts', formatFloat(electrical.inputWatts)));
    lines.push(field('Vertical angles', `${photometry.verticalAngleCount} (${range(photometry.verticalAngles)})`));
    lines.push(field('Horizontal angles', `${photometry.horizontalAngleCount} (${range(photometry.horizontalAngles)})`));
    lines.push(field('Peak candela', formatFloat(peak)));
    for (const label of record.labels) {
      lines.push(`  ${DIM}${label}${RESET}`);
    }
    return lines.filter(Boolean).join('\n');
  }

  formatPipelineResult(result: PipelineResult): string {
    return `${GREEN}✓${RESET} ${result.input} → ${BOLD}${result.output}${RESET} ${DIM}(${result.bytesWritten} bytes)${RESET}`;
  }

  formatBatchResults(results: BatchResult[]): string {
    if (!results.length) {
      return `${YELLOW}No files processed.${RESET}`;
    }
    const failed = results.filter((r) => !r.success).length;
    const lines: string[] = [header(`Batch (${results.length - failed}/${results.length} succeeded)`)];
    for (const r of results) {
      if (r.success) {
        lines.push(`  ${GREEN}✓${RESET} ${r.input} → ${r.output} ${DIM}${r.durationMs}ms${RESET}`);
      } else {
        lines.push(`  ${RED}✗${RESET} ${r.input} ${DIM}${r.error ?? 'failed'}${RESET}`);
      }
    }
    return lines.join('\n');
  }

  formatPresets(presets: Record<string, RescalePreset>): string {
    const lines: string[] = [header('Rescale presets')];
    for (const [key, preset] of Object.entries(presets)) {
      const mode = preset.preserveIntensity ? 'preserve intensity' : 'default';
      lines.push(`  ${BOLD}${key.padEnd(14)}${RESET}${String(preset.coneAngle).padStart(4)}°  ${mode}`);
      lines.push(`  ${DIM}${' '.repeat(14)}${preset.description}${RESET}`);
    }
    return lines.join('\n');
  }

  /**
   * Format an error into a friendly message with a hint where one applies.
   */
  formatError(error: unknown): string {
    const lines = [`\n${RED}${BOLD}Error:${RESET} ${ErrorHandler.toUserMessage(error)}`];

    if (error instanceof IesError) {
      switch (error.code) {
        case 'RESOURCE_ERROR':
          lines.push(`${YELLOW}Hint:${RESET} Check that the path exists and is readable, including any TILT= file.`);
          break;
        case 'STRUCTURE_ERROR':
        case 'NUMERIC_FORMAT_ERROR':
          lines.push(`${YELLOW}Hint:${RESET} The file does not follow the IESNA LM-63 layout.`);
          break;
        case 'VALIDATION_ERROR':
          lines.push(`${YELLOW}Hint:${RESET} Cone angles are given in degrees between 0 and 180.`);
          break;
        case 'CONFIG_ERROR':
          lines.push(`${YELLOW}Hint:${RESET} Run \`iesna config validate\` or \`iesna config reset\`.`);
          break;
      }
    }

    return lines.join('\n');
  }
}
