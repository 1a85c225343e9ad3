import type { PlotResult, Position, Route } from '@route-plotter/shared';
import { positionsEqual, routeNode } from '@route-plotter/shared';
import { fail } from '../sources/PlotSource.js';
import type { ResolvedNavigation } from './NavigationResolver.js';
import { DIRECT, isCoordinateName, type ParsedRoute } from './RouteGrammar.js';

type Geometry = { kind: 'sid' | 'star' | 'airway'; positions: Position[] };

type Step<T> = { ok: true; value: T } | { ok: false; result: PlotResult & { success: false } };

function indexOfPosition(positions: Position[], target: Position): number {
  return positions.findIndex((position) => positionsEqual(position, target));
}

/**
 * PathStitcher: walks consecutive point pairs and splices in the part of
 * each airway or procedure that lies between them, in travel direction.
 * Any failure discards the whole route.
 */
export class PathStitcher {
  private readonly lastIndex: number;

  constructor(
    private readonly parsed: ParsedRoute,
    private readonly nav: ResolvedNavigation
  ) {
    this.lastIndex = parsed.points.length - 1;
  }

  stitch(): PlotResult {
    const { points, connectors } = this.parsed;
    const route: Route = [];

    if (this.nav.sid && !this.nav.departure) {
      return fail('unresolved', `could not find airport '${points[0].name}'`);
    }
    if (this.nav.star && !this.nav.arrival) {
      return fail('unresolved', `could not find airport '${points[this.lastIndex].name}'`);
    }

    let previous: Position | undefined;

    for (let i = 0; i <= this.lastIndex; i++) {
      const end = this.segmentEnd(i);
      if (!end.ok) return end.result;

      const connector = i > 0 ? connectors[i - 1] : DIRECT;
      if (previous && connector !== DIRECT) {
        const interior = this.interior(i, connector, previous, end.value);
        if (!interior.ok) return interior.result;
        for (const position of interior.value) route.push(routeNode(position));
      }

      const point = points[i];
      route.push(
        routeNode(end.value, {
          // A hold typed with no length is not drawn
          hold: point.hold && point.hold.length > 0 ? point.hold : undefined,
          label: isCoordinateName(point.name) ? undefined : point.name,
        })
      );

      previous = end.value;
    }

    const result: Extract<PlotResult, { success: true }> = { success: true, route };
    if (this.parsed.name !== undefined) result.name = this.parsed.name;
    return result;
  }

  /** Where the segment into point i ends */
  private segmentEnd(i: number): Step<Position> {
    const { nav } = this;
    const point = this.parsed.points[i];

    if (i === 0 && nav.sid && nav.departure) return { ok: true, value: nav.departure };
    if (i === this.lastIndex && nav.star && nav.arrival) return { ok: true, value: nav.arrival };

    // Airports resolve through their reference point or the given runway threshold
    const terminal = i === 0 ? nav.departure : i === this.lastIndex ? nav.arrival : undefined;
    if (terminal) return { ok: true, value: terminal };

    const position = nav.points.get(point.name);
    if (!position || Number.isNaN(position.lat) || Number.isNaN(position.lon)) {
      return { ok: false, result: fail('unresolved', `could not find point '${point.name}'`) };
    }
    return { ok: true, value: position };
  }

  private geometry(i: number, connector: string): Step<Geometry> {
    const { nav } = this;

    if (i === 1 && nav.sid) return { ok: true, value: { kind: 'sid', positions: nav.sid } };
    if (i === this.lastIndex && nav.star) {
      return { ok: true, value: { kind: 'star', positions: nav.star } };
    }

    const positions = nav.airways.get(connector);
    if (!positions || positions.length === 0) {
      return { ok: false, result: fail('unresolved', `could not find airway '${connector}'`) };
    }
    return { ok: true, value: { kind: 'airway', positions } };
  }

  /** Positions strictly between the two segment ends, in travel order */
  private interior(
    i: number,
    connector: string,
    start: Position,
    end: Position
  ): Step<Position[]> {
    const geometry = this.geometry(i, connector);
    if (!geometry.ok) return geometry;

    const { kind, positions } = geometry.value;
    const { points } = this.parsed;

    const from = kind === 'sid' ? 0 : indexOfPosition(positions, start);
    if (from < 0) {
      return {
        ok: false,
        result: fail('discontinuous', `discontinuity (${points[i - 1].name} to ${connector})`),
      };
    }

    const to = kind === 'star' ? positions.length - 1 : indexOfPosition(positions, end);
    if (to < 0) {
      return {
        ok: false,
        result: fail('discontinuous', `discontinuity (${connector} to ${points[i].name})`),
      };
    }

    const value: Position[] = [];
    if (from < to) {
      for (let k = from + 1; k < to; k++) value.push(positions[k]);
    } else {
      for (let k = from - 1; k > to; k--) value.push(positions[k]);
    }
    return { ok: true, value };
  }
}
