/**
 * Dialect detection from the first line of a document.
 */

import { ByteCursor } from '../io/byte-cursor.js';
import { StructureError } from '../errors/index.js';
import { IesFormat } from '../photometry/types.js';

/** Tag lines of the dialects that declare themselves. LM-63-1986 has none. */
export const FORMAT_TAGS: Readonly<Record<string, IesFormat>> = {
  'IESNA:LM-63-1995': IesFormat.LM63_1995,
  'IESNA:LM-63-2002': IesFormat.LM63_2002,
  IESNA91: IesFormat.LM63_1991,
};

/**
 * Consume the tag line and return its dialect. Without a recognised tag
 * the document is LM-63-1986 and the cursor is rewound, so the first line
 * is read again as a label or TILT line.
 */
export function resolveFormat(cursor: ByteCursor): IesFormat {
  const first = cursor.nextLine();
  if (first === undefined || first === '') {
    throw new StructureError('Document is empty or starts with a blank line', { line: 1 });
  }

  const format = Object.prototype.hasOwnProperty.call(FORMAT_TAGS, first) ? FORMAT_TAGS[first] : undefined;
  if (format !== undefined) {
    return format;
  }

  cursor.rewind();
  return IesFormat.LM63_1986;
}
