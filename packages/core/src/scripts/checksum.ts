/**
 * @module scripts/checksum
 * CRC32 checksum of a script's text.
 *
 * The checksum is computed **line by line**: every line's UTF-8 bytes are
 * fed to the CRC with all line terminators (`\n`, `\r`, `\r\n`) removed.
 * Converting a script between LF and CRLF therefore keeps its checksum,
 * so a checkout on another platform is not reported as a changed script.
 */

import * as CRC32 from 'crc-32';

/**
 * Computes the checksum recorded in the deployment history.
 *
 * 1. Strip a UTF-8 BOM if present
 * 2. Split content into lines, dropping line terminators
 * 3. Feed each line's UTF-8 bytes to CRC32
 * 4. Return the result as a signed 32-bit integer
 *
 * @param content - Script content, as text or as lines
 * @returns Signed 32-bit CRC32 checksum
 */
export function ComputeChecksum(content: string | readonly string[]): number {
  const lines = typeof content === 'string' ? splitLines(content) : content;

  let crc = 0;
  for (const line of lines) {
    crc = CRC32.buf(Buffer.from(line, 'utf-8'), crc);
  }

  return crc;
}

function splitLines(content: string): string[] {
  const stripped = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
  return stripped.split(/\r\n|\r|\n/);
}
