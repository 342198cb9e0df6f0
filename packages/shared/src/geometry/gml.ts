/**
 * GML Surface Reader
 *
 * Converts the GML 3.2 surface geometries that NAS uses for parcel boundaries
 * into GeoJSON Polygon / MultiPolygon values. Coordinates are passed through
 * unchanged (no reprojection).
 *
 * Supported structures:
 * - gml:Polygon / gml:PolygonPatch with gml:exterior and gml:interior
 * - gml:Surface with gml:patches
 * - gml:MultiSurface / gml:CompositeSurface with gml:surfaceMember(s)
 * - boundaries as gml:LinearRing (posList / pos) or gml:Ring of curve members
 *   (gml:Curve segments or gml:LineString)
 */

import type { Element } from '@xmldom/xmldom';
import type { Position } from 'geojson';
import type { ParcelGeometry } from '../types';
import { GeometryParseError } from '../errors';
import { childElements, findChild, findChildren, findInheritedAttribute } from '../xml/elements';
import { isGmlNamespace } from '../xml/namespaces';

export interface GmlReadOptions {
  /** Dimension assumed for coordinate lists that declare none */
  defaultSrsDimension: number;
}

export interface GmlSurface {
  geometry: ParcelGeometry;
  /** srsName declared on the geometry or one of its ancestors */
  srsName: string | null;
}

type Ring = Position[];
type PolygonRings = Ring[];

const SURFACE_TYPES = ['Polygon', 'PolygonPatch', 'Surface', 'MultiSurface', 'CompositeSurface'];

const CURVE_SEGMENT_TYPES = [
  'LineStringSegment',
  'Arc',
  'ArcString',
  'Circle',
  'GeodesicString',
];

/**
 * Find the surface geometry inside a property element such as ax:position
 */
export function findSurfaceElement(property: Element): Element | null {
  return (
    childElements(property).find(
      (child) => isGmlNamespace(child.namespaceURI) &&
        SURFACE_TYPES.some((type) => type === child.localName)
    ) ?? null
  );
}

/**
 * Read a GML surface element.
 *
 * @throws GeometryParseError if the geometry is not a supported, valid surface
 */
export function readGmlSurface(element: Element, options: GmlReadOptions): GmlSurface {
  const srsName = findInheritedAttribute(element, 'srsName');
  const polygons = readSurfacePolygons(element, options);

  if (polygons.length === 0) {
    throw new GeometryParseError(`${element.localName} contains no polygons`);
  }

  const isMulti = element.localName === 'MultiSurface' || element.localName === 'CompositeSurface';
  const geometry: ParcelGeometry =
    polygons.length === 1 && !isMulti
      ? { type: 'Polygon', coordinates: polygons[0] }
      : { type: 'MultiPolygon', coordinates: polygons };

  return { geometry, srsName };
}

function readSurfacePolygons(element: Element, options: GmlReadOptions): PolygonRings[] {
  switch (element.localName) {
    case 'Polygon':
    case 'PolygonPatch':
      return [readPolygon(element, options)];

    case 'Surface': {
      const patches = findChild(element, 'patches');
      if (!patches) {
        throw new GeometryParseError('gml:Surface without gml:patches');
      }
      return childElements(patches).flatMap((patch) => readSurfacePolygons(patch, options));
    }

    case 'MultiSurface':
    case 'CompositeSurface': {
      const members = [
        ...findChildren(element, 'surfaceMember').flatMap(childElements),
        ...findChildren(element, 'surfaceMembers').flatMap(childElements),
      ];
      return members.flatMap((member) => readSurfacePolygons(member, options));
    }

    default:
      throw new GeometryParseError(`Unsupported surface type: ${element.localName}`);
  }
}

function readPolygon(element: Element, options: GmlReadOptions): PolygonRings {
  const exterior = findChild(element, 'exterior');
  if (!exterior) {
    throw new GeometryParseError(`${element.localName} without gml:exterior`);
  }

  const rings = [readBoundary(exterior, options)];
  for (const interior of findChildren(element, 'interior')) {
    rings.push(readBoundary(interior, options));
  }
  return rings;
}

/**
 * Read an exterior / interior boundary into a closed ring
 */
function readBoundary(boundary: Element, options: GmlReadOptions): Ring {
  const ringElement = childElements(boundary)[0];
  if (!ringElement) {
    throw new GeometryParseError(`Empty gml:${boundary.localName}`);
  }

  let ring: Ring;
  switch (ringElement.localName) {
    case 'LinearRing':
      ring = readPositions(ringElement, options);
      break;

    case 'Ring':
      ring = chainCurves(
        findChildren(ringElement, 'curveMember').map((member) => readCurveMember(member, options))
      );
      break;

    default:
      throw new GeometryParseError(`Unsupported ring type: ${ringElement.localName}`);
  }

  assertClosedRing(ring);
  return ring;
}

function readCurveMember(member: Element, options: GmlReadOptions): Position[] {
  const curve = childElements(member)[0];
  if (!curve) {
    throw new GeometryParseError('Empty gml:curveMember');
  }

  switch (curve.localName) {
    case 'LineString':
      return readPositions(curve, options);

    case 'Curve': {
      const segments = findChild(curve, 'segments');
      if (!segments) {
        throw new GeometryParseError('gml:Curve without gml:segments');
      }
      return chainCurves(
        childElements(segments).map((segment) => {
          if (!CURVE_SEGMENT_TYPES.some((type) => type === segment.localName)) {
            throw new GeometryParseError(`Unsupported curve segment: ${segment.localName}`);
          }
          // Arc control points are used as vertices
          return readPositions(segment, options);
        })
      );
    }

    default:
      throw new GeometryParseError(`Unsupported curve type: ${curve.localName}`);
  }
}

/**
 * Concatenate curve pieces, dropping the repeated vertex where two pieces meet
 */
export function chainCurves(pieces: Position[][]): Position[] {
  const chained: Position[] = [];
  for (const piece of pieces) {
    const last = chained[chained.length - 1];
    const start = last !== undefined && piece.length > 0 && samePosition(last, piece[0]) ? 1 : 0;
    chained.push(...piece.slice(start));
  }
  return chained;
}

/**
 * Read the coordinates of an element holding gml:posList or gml:pos children
 */
export function readPositions(element: Element, options: GmlReadOptions): Position[] {
  const posList = findChild(element, 'posList');
  if (posList) {
    const dimensionAttr = findInheritedAttribute(posList, 'srsDimension');
    const dimension = dimensionAttr ? parseInt(dimensionAttr, 10) : options.defaultSrsDimension;
    return parsePosList(posList.textContent ?? '', dimension);
  }

  const positions = findChildren(element, 'pos');
  if (positions.length === 0) {
    throw new GeometryParseError(`gml:${element.localName} without coordinates`);
  }
  return positions.map((pos) => parsePos(pos.textContent ?? ''));
}

/**
 * Parse a whitespace-separated coordinate list into positions of `dimension` values
 */
export function parsePosList(text: string, dimension: number): Position[] {
  if (!Number.isInteger(dimension) || dimension < 2) {
    throw new GeometryParseError(`Invalid srsDimension: ${dimension}`);
  }

  const values = parseNumbers(text);
  if (values.length === 0 || values.length % dimension !== 0) {
    throw new GeometryParseError(
      `Coordinate count ${values.length} is not a multiple of srsDimension ${dimension}`
    );
  }

  const positions: Position[] = [];
  for (let i = 0; i < values.length; i += dimension) {
    positions.push(values.slice(i, i + dimension));
  }
  return positions;
}

/**
 * Parse a single gml:pos
 */
export function parsePos(text: string): Position {
  const values = parseNumbers(text);
  if (values.length < 2) {
    throw new GeometryParseError(`gml:pos needs at least two coordinates, got ${values.length}`);
  }
  return values;
}

function parseNumbers(text: string): number[] {
  const tokens = text.trim().split(/\s+/).filter((token) => token.length > 0);
  return tokens.map((token) => {
    const value = Number(token);
    if (!Number.isFinite(value)) {
      throw new GeometryParseError(`Invalid coordinate value: ${token}`);
    }
    return value;
  });
}

function samePosition(a: Position, b: Position): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

function assertClosedRing(ring: Ring): void {
  if (ring.length < 4) {
    throw new GeometryParseError(`Ring has ${ring.length} positions, at least 4 required`);
  }
  if (!samePosition(ring[0], ring[ring.length - 1])) {
    throw new GeometryParseError('Ring is not closed');
  }
}
