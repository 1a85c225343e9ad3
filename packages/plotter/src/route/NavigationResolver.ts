import type { NavDatabase, NavElement, Position } from '@route-plotter/shared';
import { positionsEqual } from '@route-plotter/shared';
import { DIRECT, type ParsedRoute, type RoutePoint } from './RouteGrammar.js';

/** Everything one scan of the navigation database found for a route */
export interface ResolvedNavigation {
  /** Positions by point name; coordinate literals start out filled */
  points: Map<string, Position>;
  /** Airway geometry by connector name */
  airways: Map<string, Position[]>;
  /** Departure airport reference or runway threshold */
  departure?: Position;
  /** Arrival airport reference or runway threshold */
  arrival?: Position;
  /** SID geometry, when the first connector names one */
  sid?: Position[];
  /** STAR geometry followed by the arrival position */
  star?: Position[];
}

type Terminal = 'departure' | 'arrival';

/** Airport code used for runway matching */
function airportPrefix(name: string): string {
  return name.slice(0, 4);
}

/**
 * NavigationResolver: one pass over the navigation database, collecting
 * the positions a route needs. Names that stay unresolved are not an
 * error here; the stitcher reports them if they are actually needed.
 */
export class NavigationResolver {
  private readonly first: RoutePoint;
  private readonly last: RoutePoint;
  private readonly sidConnector?: string;
  private readonly starConnector?: string;
  private readonly pointNames: Set<string>;
  private readonly airwayNames: Set<string>;

  constructor(private readonly route: ParsedRoute) {
    this.first = route.points[0];
    this.last = route.points[route.points.length - 1];
    this.pointNames = new Set(route.points.map((point) => point.name));
    this.airwayNames = new Set(route.connectors.filter((connector) => connector !== DIRECT));

    const { connectors } = route;
    if (connectors.length > 0) {
      if (connectors[0] !== DIRECT) this.sidConnector = connectors[0];
      if (connectors[connectors.length - 1] !== DIRECT) {
        this.starConnector = connectors[connectors.length - 1];
      }
    }
  }

  resolve(navDatabase: NavDatabase): ResolvedNavigation {
    const resolved: ResolvedNavigation = {
      points: new Map(),
      airways: new Map(),
    };

    for (const point of this.route.points) {
      if (point.position) resolved.points.set(point.name, point.position);
    }

    for (const element of navDatabase.elements()) {
      this.visit(element, resolved);
    }

    if (resolved.star && resolved.arrival) {
      resolved.star.push(resolved.arrival);
    }

    return resolved;
  }

  private terminals(): [Terminal, RoutePoint][] {
    return [
      ['departure', this.first],
      ['arrival', this.last],
    ];
  }

  private visit(element: NavElement, resolved: ResolvedNavigation): void {
    switch (element.type) {
      case 'airport':
        for (const [terminal, point] of this.terminals()) {
          if (point.runway === undefined && point.name === element.name) {
            resolved[terminal] = element.position;
          }
        }
        this.matchName(element.name, element.position, resolved);
        break;

      case 'fix':
      case 'vor':
      case 'ndb':
        this.matchName(element.name, element.position, resolved);
        break;

      case 'runway':
        for (const [terminal, point] of this.terminals()) {
          if (
            point.runway === undefined ||
            airportPrefix(point.name) !== airportPrefix(element.airportName)
          ) {
            continue;
          }
          for (const end of element.ends) {
            if (end.id === point.runway && end.threshold) {
              resolved[terminal] = end.threshold;
            }
          }
        }
        break;

      case 'sid':
        if (
          !resolved.sid &&
          this.sidConnector === element.name &&
          this.matchesProcedure(this.first, element.airportName, element.runway)
        ) {
          resolved.sid = [...element.positions];
        }
        break;

      case 'star':
        if (
          !resolved.star &&
          this.starConnector === element.name &&
          this.matchesProcedure(this.last, element.airportName, element.runway)
        ) {
          resolved.star = [...element.positions];
        }
        break;

      case 'lowAirway':
      case 'highAirway': {
        if (!this.airwayNames.has(element.name)) break;
        let positions = resolved.airways.get(element.name);
        if (!positions) {
          positions = [];
          resolved.airways.set(element.name, positions);
        }
        for (const position of element.positions) {
          const tail = positions[positions.length - 1];
          if (!tail || !positionsEqual(tail, position)) positions.push(position);
        }
        break;
      }
    }
  }

  /** Fixes, navaids and airports: last match in scan order wins */
  private matchName(name: string, position: Position, resolved: ResolvedNavigation): void {
    if (this.pointNames.has(name)) {
      resolved.points.set(name, position);
    }
  }

  private matchesProcedure(point: RoutePoint, airportName: string, runway?: string): boolean {
    return (
      point.name === airportName &&
      (point.runway === undefined || point.runway === runway)
    );
  }
}
