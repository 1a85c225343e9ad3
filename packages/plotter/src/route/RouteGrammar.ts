import type { Hold, PlotErrorKind, Position } from '@route-plotter/shared';
import { parseCoordinate } from './coordinates.js';

/** Connector meaning "direct, no intermediate geometry" */
export const DIRECT = 'DCT';

/** Hold leg length used when the suffix gives none (nm) */
export const DEFAULT_HOLD_LENGTH = 4;

/** One classified point token */
export interface RoutePoint {
  /** Token text before any "/" suffix */
  name: string;
  /** Runway designator, only on the first or last point */
  runway?: string;
  hold?: Hold;
  /** Already known from a coordinate literal */
  position?: Position;
}

/** Point/connector sequence; connectors[i] joins points[i] and points[i + 1] */
export interface ParsedRoute {
  name?: string;
  points: RoutePoint[];
  connectors: string[];
}

export type GrammarResult =
  | { success: true; route: ParsedRoute }
  | { success: false; error: string; errorKind: PlotErrorKind };

type SuffixResult =
  | { ok: true; point: RoutePoint }
  | { ok: false; error: string; errorKind: PlotErrorKind };

const DIGITS = /^\d+$/;

/**
 * Split "NAME/SUFFIX". A suffix longer than three characters is a hold
 * ("090L", "270R6"); a shorter one is a runway and may only appear on the
 * first or last point.
 */
function classifyPoint(
  token: string,
  terminal: boolean,
  defaultHoldLength: number
): SuffixResult {
  const sep = token.indexOf('/');
  if (sep < 0) return { ok: true, point: withPosition({ name: token }) };

  const name = token.slice(0, sep);
  const suffix = token.slice(sep + 1);

  if (suffix.length > 3) {
    const course = suffix.slice(0, 3);
    const direction = suffix[3].toUpperCase();
    const length = suffix.slice(4);

    if (!DIGITS.test(course)) {
      return { ok: false, error: 'invalid integer', errorKind: 'malformedInput' };
    }
    if (direction !== 'L' && direction !== 'R') {
      return { ok: false, error: 'invalid hold direction', errorKind: 'semanticallyInvalid' };
    }
    if (length.length > 0 && !DIGITS.test(length)) {
      return { ok: false, error: 'invalid integer', errorKind: 'malformedInput' };
    }

    const hold: Hold = {
      length: length.length > 0 ? parseInt(length, 10) : defaultHoldLength,
      course: parseInt(course, 10),
      leftTurns: direction === 'L',
    };
    return { ok: true, point: withPosition({ name, hold }) };
  }

  if (!terminal) {
    return {
      ok: false,
      error: 'runway in nonterminal location',
      errorKind: 'semanticallyInvalid',
    };
  }

  const point: RoutePoint = { name };
  if (suffix.length > 0) point.runway = suffix;
  return { ok: true, point: withPosition(point) };
}

/** Coordinate-shaped names resolve without a lookup */
function withPosition(point: RoutePoint): RoutePoint {
  if (isCoordinateName(point.name)) {
    const position = parseCoordinate(point.name);
    if (position) point.position = position;
  }
  return point;
}

/** Names starting with a digit are coordinates and are drawn unlabeled */
export function isCoordinateName(name: string): boolean {
  return name.length > 0 && name[0] >= '0' && name[0] <= '9';
}

/**
 * Tokenize and classify a route description:
 *
 *   [NAME] POINT *(CONNECTOR POINT)
 *
 * An even number of tokens means the first one is the route name.
 */
export function parseRouteGrammar(
  tokens: string[],
  defaultHoldLength = DEFAULT_HOLD_LENGTH
): GrammarResult {
  if (tokens.length === 0) {
    return { success: false, error: 'missing route', errorKind: 'malformedInput' };
  }

  let rest = tokens;
  let name: string | undefined;
  if (tokens.length % 2 === 0) {
    name = tokens[0];
    rest = tokens.slice(1);
  }

  const points: RoutePoint[] = [];
  const connectors: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    if (i % 2 === 1) {
      connectors.push(rest[i]);
      continue;
    }

    const terminal = i === 0 || i === rest.length - 1;
    const classified = classifyPoint(rest[i], terminal, defaultHoldLength);
    if (!classified.ok) {
      return { success: false, error: classified.error, errorKind: classified.errorKind };
    }
    points.push(classified.point);
  }

  const route: ParsedRoute = { points, connectors };
  if (name !== undefined) route.name = name;
  return { success: true, route };
}
