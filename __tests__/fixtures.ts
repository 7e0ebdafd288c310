import type { Facet } from '../vector_math';

export type BinaryFixtureFacet = Facet & { attribute?: number };

export const CCW: Facet = {
  normal: [0, 0, 1],
  vertices: [
    [0, 0, 0],
    [1, 0, 0],
    [0, 1, 0],
  ],
};

export const CW: Facet = {
  normal: [0, 0, 1],
  vertices: [
    [0, 0, 0],
    [0, 1, 0],
    [1, 0, 0],
  ],
};

export const NEGATIVE: Facet = {
  normal: [0, 0, 1],
  vertices: [
    [-1, 0, 0],
    [1, 0, 0],
    [0, 1, 0],
  ],
};

export function trianglesToAscii(facets: Facet[], solidName: string, endName: string = solidName): string {
  const lines: string[] = [];
  lines.push(solidName === '' ? 'solid' : `solid ${solidName}`);
  for (const facet of facets) {
    const [nx, ny, nz] = facet.normal;
    lines.push(`  facet normal ${nx} ${ny} ${nz}`);
    lines.push('    outer loop');
    for (const [x, y, z] of facet.vertices) {
      lines.push(`      vertex ${x} ${y} ${z}`);
    }
    lines.push('    endloop');
    lines.push('  endfacet');
  }
  lines.push(endName === '' ? 'endsolid' : `endsolid ${endName}`);
  return lines.join('\n') + '\n';
}

export function trianglesToBinary(facets: BinaryFixtureFacet[], declaredCount: number = facets.length): Uint8Array {
  const bytes = new Uint8Array(84 + facets.length * 50);
  const view = new DataView(bytes.buffer);
  view.setUint32(80, declaredCount, true);
  let offset = 84;
  for (const facet of facets) {
    const floats = [facet.normal, ...facet.vertices].flat();
    floats.forEach((value, i) => view.setFloat32(offset + i * 4, value, true));
    view.setUint16(offset + 48, facet.attribute ?? 0, true);
    offset += 50;
  }
  return bytes;
}

export const encodeText = (text: string): Uint8Array => new TextEncoder().encode(text);
