/** Geographic position in degrees */
export interface Position {
  lat: number;
  lon: number;
}

/** Racetrack holding pattern attached to a route point */
export interface Hold {
  /** Leg length (nm) */
  length: number;
  /** Inbound course (degrees, 0-360) */
  course: number;
  /** Left-hand pattern */
  leftTurns: boolean;
}

/**
 * One point of a plotted route.
 * A node whose lat and lon are both NaN is a discontinuity.
 */
export interface RouteNode {
  lat: number;
  lon: number;
  /** Drawn with an enlarged marker */
  highlight: boolean;
  /** Text drawn beside the point */
  label?: string;
  hold?: Hold;
}

/**
 * Ordered node sequence. Interior discontinuities split it into
 * independently drawn polylines; an empty route means nothing resolved.
 */
export type Route = RouteNode[];
