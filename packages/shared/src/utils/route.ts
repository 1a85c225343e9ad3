import type { Hold, Position, Route, RouteNode } from '../types/route.js';

/** Node that breaks continuity between two polylines */
export function discontinuity(): RouteNode {
  return { lat: NaN, lon: NaN, highlight: false };
}

export function isDiscontinuity(node: RouteNode): boolean {
  return Number.isNaN(node.lat) || Number.isNaN(node.lon);
}

/** Build a plain route node at a position */
export function routeNode(
  position: Position,
  extras: { highlight?: boolean; label?: string; hold?: Hold } = {}
): RouteNode {
  const node: RouteNode = {
    lat: position.lat,
    lon: position.lon,
    highlight: extras.highlight ?? false,
  };
  if (extras.label !== undefined) node.label = extras.label;
  if (extras.hold) node.hold = extras.hold;
  return node;
}

/** Exact position equality, used to locate points inside airway geometry */
export function positionsEqual(a: Position, b: Position): boolean {
  return a.lat === b.lat && a.lon === b.lon;
}

/**
 * Split a route into maximal runs of drawable nodes.
 * Consumers draw each run as one polyline and never connect across a
 * discontinuity.
 */
export function splitPolylines(route: Route): RouteNode[][] {
  const runs: RouteNode[][] = [];
  let current: RouteNode[] = [];

  for (const node of route) {
    if (isDiscontinuity(node)) {
      if (current.length > 0) runs.push(current);
      current = [];
    } else {
      current.push(node);
    }
  }
  if (current.length > 0) runs.push(current);

  return runs;
}
