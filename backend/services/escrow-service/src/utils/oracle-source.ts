import { readFileSync } from 'fs';

/**
 * Reads an oracle script from disk with LF line endings and no byte-order mark.
 */
export function loadOracleSource(filePath: string): string {
  const raw = readFileSync(filePath, 'utf8');
  return raw.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
}
