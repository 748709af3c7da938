/**
 * Raster-to-vector conversion for boolean masks.
 *
 * Masked pixels are grouped into 4-connected components and each component's
 * pixel boundary is traced into a GeoJSON polygon (CCW shell, CW holes).
 */
import type { Polygon, Position } from 'geojson';

export type Lattice = {
  west: number;
  north: number;
  /** Pixel width in degrees of longitude */
  dx: number;
  /** Pixel height in degrees of latitude */
  dy: number;
  width: number;
  height: number;
};

// Directions in counter-clockwise order so that a right turn is (d + 3) % 4
const EAST = 0;
const NORTH = 1;
const WEST = 2;
const SOUTH = 3;

type Edge = {
  x: number;
  y: number;
  dir: number;
};

const STEP: Record<number, [number, number]> = {
  [EAST]: [1, 0],
  [NORTH]: [0, 1],
  [WEST]: [-1, 0],
  [SOUTH]: [0, -1],
};

// ==========================================
// CONNECTED COMPONENTS
// ==========================================

/**
 * Label 4-connected components of a row-major mask (row 0 = north).
 * Returns the label per pixel (0 = unmasked) and the pixel indices of each
 * component, in discovery order.
 */
export function labelComponents(mask: Uint8Array, width: number, height: number) {
  const labels = new Int32Array(width * height);
  const components: number[][] = [];

  for (let start = 0; start < mask.length; start++) {
    if (!mask[start] || labels[start] !== 0) continue;
    const label = components.length + 1;
    const pixels: number[] = [];
    const queue: number[] = [start];
    labels[start] = label;

    for (let head = 0; head < queue.length; head++) {
      const index = queue[head];
      pixels.push(index);
      const col = index % width;
      const row = (index - col) / width;
      const neighbours = [
        col > 0 ? index - 1 : -1,
        col < width - 1 ? index + 1 : -1,
        row > 0 ? index - width : -1,
        row < height - 1 ? index + width : -1,
      ];
      for (const n of neighbours) {
        if (n >= 0 && mask[n] && labels[n] === 0) {
          labels[n] = label;
          queue.push(n);
        }
      }
    }
    components.push(pixels);
  }

  return { labels, components };
}

// ==========================================
// BOUNDARY TRACING
// ==========================================

function signedArea(ring: Position[]): number {
  let sum = 0;
  for (let i = 0; i < ring.length - 1; i++) {
    sum += ring[i][0] * ring[i + 1][1] - ring[i + 1][0] * ring[i][1];
  }
  return sum / 2;
}

/**
 * Boundary edges of one component in vertex space (x right, y up), oriented
 * with the component on the left.
 */
function boundaryEdges(pixels: number[], labels: Int32Array, label: number, width: number, height: number): Edge[] {
  // y counts rows from the southern edge
  const inside = (col: number, y: number) =>
    col >= 0 && col < width && y >= 0 && y < height && labels[(height - 1 - y) * width + col] === label;

  const edges: Edge[] = [];
  for (const index of pixels) {
    const col = index % width;
    const y = height - 1 - (index - col) / width;
    if (!inside(col, y - 1)) edges.push({ x: col, y, dir: EAST });
    if (!inside(col + 1, y)) edges.push({ x: col + 1, y, dir: NORTH });
    if (!inside(col, y + 1)) edges.push({ x: col + 1, y: y + 1, dir: WEST });
    if (!inside(col - 1, y)) edges.push({ x: col, y: y + 1, dir: SOUTH });
  }
  return edges;
}

/**
 * Chain edges into closed rings. Where two pixels of the component meet only
 * at a corner, the walk turns right so the shell and the hole it pinches off
 * come out as separate rings touching at that vertex.
 */
function traceRings(edges: Edge[]): Position[][] {
  const outgoing = new Map<string, number[]>();
  edges.forEach((edge, i) => {
    const key = `${edge.x},${edge.y}`;
    const list = outgoing.get(key);
    if (list) list.push(i);
    else outgoing.set(key, [i]);
  });

  const used = new Uint8Array(edges.length);
  const rings: Position[][] = [];

  for (let first = 0; first < edges.length; first++) {
    if (used[first]) continue;
    const chain: Edge[] = [];
    let current = first;

    while (true) {
      used[current] = 1;
      const edge = edges[current];
      chain.push(edge);
      const [sx, sy] = STEP[edge.dir];
      const endX = edge.x + sx;
      const endY = edge.y + sy;

      const candidates = (outgoing.get(`${endX},${endY}`) ?? []).filter((i) => !used[i] || i === first);
      if (candidates.length === 0) {
        throw new Error(`Open boundary at vertex ${endX},${endY}`);
      }
      const preference = [(edge.dir + 3) % 4, edge.dir, (edge.dir + 1) % 4];
      let next = candidates[0];
      for (const dir of preference) {
        const match = candidates.find((i) => edges[i].dir === dir);
        if (match !== undefined) {
          next = match;
          break;
        }
      }
      if (next === first) break;
      current = next;
    }

    // Keep only the corners
    const ring: Position[] = [];
    chain.forEach((edge, i) => {
      const previous = chain[(i + chain.length - 1) % chain.length];
      if (previous.dir !== edge.dir) ring.push([edge.x, edge.y]);
    });
    ring.push([ring[0][0], ring[0][1]]);
    rings.push(ring);
  }

  return rings;
}

// ==========================================
// POLYGONS
// ==========================================

/**
 * Trace every 4-connected component of the mask into a polygon in
 * geographic coordinates. Components touching only diagonally stay separate.
 */
export function polygonizeMask(mask: Uint8Array, lattice: Lattice): Polygon[] {
  const { width, height, west, north, dx, dy } = lattice;
  const south = north - height * dy;
  const { labels, components } = labelComponents(mask, width, height);

  const toGeographic = (ring: Position[]): Position[] => ring.map(([x, y]) => [west + x * dx, south + y * dy]);

  return components.map((pixels, i): Polygon => {
    const rings = traceRings(boundaryEdges(pixels, labels, i + 1, width, height));
    const shells = rings.filter((ring) => signedArea(ring) > 0).sort((a, b) => signedArea(b) - signedArea(a));
    const holes = rings.filter((ring) => signedArea(ring) < 0);
    return { type: 'Polygon', coordinates: [shells[0], ...holes].map(toGeographic) };
  });
}
