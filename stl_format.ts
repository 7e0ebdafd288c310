export type Encoding = 'ASCII' | 'binary';

export const HEADER_BYTES = 80;
export const COUNT_BYTES = 4;
export const RECORD_BYTES = 50;
export const FIRST_RECORD_OFFSET = HEADER_BYTES + COUNT_BYTES;

export const recordOffset = (index: number): number => FIRST_RECORD_OFFSET + index * RECORD_BYTES;

/**
 * Binary iff the triangle count read after the 80-byte header accounts for
 * every byte of the file. This is a size heuristic, not a format marker: a
 * text file whose length happens to fit is classified as binary.
 */
export function detectEncoding(fileLength: number, triangleCount?: number): Encoding {
  if (triangleCount === undefined) return 'ASCII';
  return recordOffset(triangleCount) === fileLength ? 'binary' : 'ASCII';
}

export function readTriangleCount(bytes: Uint8Array): number | undefined {
  if (bytes.byteLength < FIRST_RECORD_OFFSET) return undefined;
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  return view.getUint32(HEADER_BYTES, true);
}

export function detectEncodingOfBytes(bytes: Uint8Array): Encoding {
  return detectEncoding(bytes.byteLength, readTriangleCount(bytes));
}
