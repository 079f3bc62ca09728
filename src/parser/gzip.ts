/**
 * Gzip unwrapping for game master dumps.
 *
 * Dumps are either the raw serialized message or the same bytes gzip-wrapped.
 */

import pako from 'pako';

// Magic bytes for gzip
const GZIP_MAGIC = [0x1f, 0x8b];

/**
 * Check if data is a packed (gzip-compressed) dump.
 */
export function isPacked(data: Uint8Array): boolean {
  if (data.length < GZIP_MAGIC.length) {
    return false;
  }

  return data[0] === GZIP_MAGIC[0] && data[1] === GZIP_MAGIC[1];
}

/**
 * Decompress a packed dump. Unpacked data is returned as-is.
 */
export function decompress(data: Uint8Array): Uint8Array {
  if (!isPacked(data)) {
    return data;
  }

  try {
    return pako.ungzip(data);
  } catch (error) {
    throw new Error(`Failed to decompress game master: ${error}`);
  }
}
