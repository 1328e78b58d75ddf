/**
 * Label lines up to and including the TILT= directive.
 */

import { ByteCursor } from '../io/byte-cursor.js';
import { StructureError } from '../errors/index.js';

export const TILT_PREFIX = 'TILT=';

export interface LabelSection {
  labels: string[];
  /** Everything after "TILT=" on the directive line. */
  tiltReference: string;
}

export function readLabelSection(cursor: ByteCursor): LabelSection {
  const labels: string[] = [];

  for (;;) {
    const line = cursor.nextLine();
    if (line === undefined) {
      throw new StructureError('Reached end of input before the TILT= line', {
        line: cursor.lineNumber,
        labels: labels.length,
      });
    }
    if (line === '') {
      throw new StructureError('Blank line in label section', { line: cursor.lineNumber });
    }
    if (line.startsWith(TILT_PREFIX)) {
      return { labels, tiltReference: line.slice(TILT_PREFIX.length) };
    }
    labels.push(line);
  }
}
