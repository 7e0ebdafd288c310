import type { Diagnostic, DiagnosticAccumulator } from './diagnostics';
import { offsetAt } from './diagnostics';
import type { Result } from './result';
import { OK_VOID } from './result';
import { FIRST_RECORD_OFFSET, HEADER_BYTES, RECORD_BYTES, recordOffset } from './stl_format';
import type { Facet, Vec3 } from './vector_math';
import { hasNaN, hasNegativeCoordinate, isCounterClockwise } from './vector_math';

export type BinaryFacet = Facet & { attribute: number };

function readFloat3(view: DataView, offset: number): Vec3 {
  const x = view.getFloat32(offset + 0, true);
  const y = view.getFloat32(offset + 4, true);
  const z = view.getFloat32(offset + 8, true);
  return [x, y, z];
}

export function readFacet(view: DataView, offset: number): BinaryFacet {
  const normal = readFloat3(view, offset);
  const v1 = readFloat3(view, offset + 12);
  const v2 = readFloat3(view, offset + 24);
  const v3 = readFloat3(view, offset + 36);
  const attribute = view.getUint16(offset + 48, true);
  return { normal, vertices: [v1, v2, v3], attribute };
}

function checkFacet(facet: BinaryFacet, offset: number, accumulator: DiagnosticAccumulator): Result<void, Diagnostic> {
  const [v1, v2, v3] = facet.vertices;
  const at = offsetAt(offset);

  if (hasNegativeCoordinate(facet.vertices)) {
    const flagged = accumulator.raise(
      'negative-vertex',
      at,
      'not all vertices of this facet have positive values'
    );
    if (!flagged.ok) return flagged;
  }
  if (!isCounterClockwise(v1, v2, v3, facet.normal)) {
    const flagged = accumulator.raise(
      'winding-order',
      at,
      'vertices of this facet are not ordered counterclockwise'
    );
    if (!flagged.ok) return flagged;
  }
  if (hasNaN([facet.normal, v1, v2, v3])) {
    return accumulator.error('nan-value', at, 'file contains NaN values in normal or vertex coordinates');
  }
  if (facet.attribute !== 0) {
    return accumulator.error('attribute-byte-count', at, "attribute byte count should be '0'", String(facet.attribute));
  }
  return OK_VOID;
}

/**
 * Walks a binary STL: 80 ignored header bytes, a little-endian uint32
 * triangle count, then one 50-byte record per triangle. A count that runs
 * past the end of the buffer stops with an unexpected-end-of-input error.
 */
export function validateBinary(bytes: Uint8Array, accumulator: DiagnosticAccumulator): Result<void, Diagnostic> {
  if (bytes.byteLength < FIRST_RECORD_OFFSET) {
    return accumulator.error(
      'unexpected-end-of-input',
      offsetAt(HEADER_BYTES),
      'expected an 80-byte header and a 4-byte triangle count',
      `${bytes.byteLength} bytes`
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const triangleCount = view.getUint32(HEADER_BYTES, true);

  for (let i = 0; i < triangleCount; i++) {
    const offset = recordOffset(i);
    if (offset + RECORD_BYTES > bytes.byteLength) {
      return accumulator.error(
        'unexpected-end-of-input',
        offsetAt(offset),
        `expected ${triangleCount} triangle records of ${RECORD_BYTES} bytes`,
        `end of input after ${i} records`
      );
    }
    const checked = checkFacet(readFacet(view, offset), offset, accumulator);
    if (!checked.ok) return checked;
  }
  return OK_VOID;
}
