// Byte-order-mark sniffing for keyword planner exports. Google exports the
// tab-separated variant as UTF-16LE; most spreadsheet tools write UTF-8.

import { TextDecoder } from 'util';

export type DetectedEncoding = 'utf-16le' | 'utf-16be' | 'utf-8-bom' | 'utf-8';

export function detectEncoding(bytes: Uint8Array): DetectedEncoding {
  if (bytes[0] === 0xff && bytes[1] === 0xfe) return 'utf-16le';
  if (bytes[0] === 0xfe && bytes[1] === 0xff) return 'utf-16be';
  if (bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf) return 'utf-8-bom';
  return 'utf-8';
}

function isHighSurrogate(unit: number): boolean {
  return unit >= 0xd800 && unit <= 0xdbff;
}

/**
 * Decode a UTF-16 body (BOM already removed). A truncated tail (odd byte or a
 * dangling high surrogate) is dropped and the converted prefix kept; any
 * other malformed input yields the empty string.
 */
function decodeUtf16(body: Uint8Array, endian: 'le' | 'be'): string {
  let units = Buffer.from(body.subarray(0, body.length - (body.length % 2)));
  if (endian === 'be') {
    units.swap16();
  }

  if (units.length >= 2 && isHighSurrogate(units.readUInt16LE(units.length - 2))) {
    units = units.subarray(0, units.length - 2);
  }

  try {
    return new TextDecoder('utf-16le', { fatal: true }).decode(units);
  } catch {
    return '';
  }
}

export function decodeToText(bytes: Uint8Array): string {
  switch (detectEncoding(bytes)) {
    case 'utf-16le':
      return decodeUtf16(bytes.subarray(2), 'le');
    case 'utf-16be':
      return decodeUtf16(bytes.subarray(2), 'be');
    case 'utf-8-bom':
      return new TextDecoder('utf-8').decode(bytes.subarray(3));
    case 'utf-8':
      return new TextDecoder('utf-8').decode(bytes);
  }
}
