// Planar geometry helpers over (longitude, latitude) pairs
import { GEOMETRY_TYPES, type Geometry, type Position } from '../alert.model.js';
import { InvalidPolygonError } from '../middleware/error.js';

export type LonLat = readonly [number, number];

const EPSILON = 1e-12;

function isPosition(value: unknown): value is Position {
  return (
    Array.isArray(value) &&
    value.length >= 2 &&
    value.every((n) => typeof n === 'number' && Number.isFinite(n))
  );
}

function isNested(value: unknown, depth: number): boolean {
  if (depth === 0) return isPosition(value);
  return Array.isArray(value) && value.every((child) => isNested(child, depth - 1));
}

const COORDINATE_DEPTH: Record<Geometry['type'], number> = {
  Point: 0,
  MultiPoint: 1,
  LineString: 1,
  MultiLineString: 2,
  Polygon: 2,
  MultiPolygon: 3,
};

function isGeometryType(value: unknown): value is Geometry['type'] {
  return GEOMETRY_TYPES.some((t) => t === value);
}

export function isGeometry(value: unknown): value is Geometry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('type' in value) || !('coordinates' in value)) return false;
  const { type, coordinates } = value;
  return isGeometryType(type) && isNested(coordinates, COORDINATE_DEPTH[type]);
}

/**
 * Checks a caller-supplied ring and returns it as (lon, lat) tuples.
 * Throws InvalidPolygonError when the ring is open, too short or out of range.
 */
export function validateRing(ring: readonly (readonly number[])[]): LonLat[] {
  if (ring.length < 4) {
    throw new InvalidPolygonError('polygon needs at least 4 positions (a closed triangle)');
  }
  const positions: LonLat[] = ring.map((position, index) => {
    const [lon, lat] = position;
    if (
      position.length !== 2 ||
      !Number.isFinite(lon) ||
      !Number.isFinite(lat) ||
      lon < -180 ||
      lon > 180 ||
      lat < -90 ||
      lat > 90
    ) {
      throw new InvalidPolygonError(`position ${index} is not a valid [longitude, latitude] pair`);
    }
    return [lon, lat];
  });
  const first = positions[0];
  const last = positions[positions.length - 1];
  if (first[0] !== last[0] || first[1] !== last[1]) {
    throw new InvalidPolygonError('polygon ring is not closed (first position must equal last)');
  }
  return positions;
}

function onSegment(point: LonLat, a: LonLat, b: LonLat): boolean {
  const cross = (b[0] - a[0]) * (point[1] - a[1]) - (b[1] - a[1]) * (point[0] - a[0]);
  if (Math.abs(cross) > EPSILON) return false;
  return (
    point[0] >= Math.min(a[0], b[0]) - EPSILON &&
    point[0] <= Math.max(a[0], b[0]) + EPSILON &&
    point[1] >= Math.min(a[1], b[1]) - EPSILON &&
    point[1] <= Math.max(a[1], b[1]) + EPSILON
  );
}

/**
 * Inclusive point-in-polygon on a closed ring: points on an edge or vertex
 * count as inside. Even-odd ray casting for the interior.
 */
export function pointInRing(point: LonLat, ring: readonly LonLat[]): boolean {
  for (let i = 0; i < ring.length - 1; i++) {
    if (onSegment(point, ring[i], ring[i + 1])) return true;
  }
  let inside = false;
  const [x, y] = point;
  for (let i = 0, j = ring.length - 2; i < ring.length - 1; j = i++) {
    const [xi, yi] = ring[i];
    const [xj, yj] = ring[j];
    if (yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi) {
      inside = !inside;
    }
  }
  return inside;
}
