import type { NavDatabase, PlotResult } from '@route-plotter/shared';
import { NavigationResolver } from '../route/NavigationResolver.js';
import { PathStitcher } from '../route/PathStitcher.js';
import { DEFAULT_HOLD_LENGTH, parseRouteGrammar } from '../route/RouteGrammar.js';
import type { PlotInput, PlotSource } from './PlotSource.js';

/**
 * Resolve a route description against a navigation database.
 * Pure: nothing is cached between calls, so results always reflect the
 * database as it is now.
 *
 *   resolveRoute(['EGLL/27L', 'MID3G', 'MID', 'L9', 'SFD', 'DCT', 'EGKK'], db)
 */
export function resolveRoute(
  tokens: string[],
  navDatabase: NavDatabase,
  defaultHoldLength = DEFAULT_HOLD_LENGTH
): PlotResult {
  const grammar = parseRouteGrammar(tokens, defaultHoldLength);
  if (!grammar.success) return grammar;

  const resolved = new NavigationResolver(grammar.route).resolve(navDatabase);
  return new PathStitcher(grammar.route, resolved).stitch();
}

/**
 * RouteSource: plot a flight plan route given in ICAO-like notation.
 */
export class RouteSource implements PlotSource {
  readonly kind = 'route' as const;
  readonly helpArguments = '<ROUTE>';
  readonly helpDescription = 'Plot a flight plan route';

  constructor(private readonly defaultHoldLength = DEFAULT_HOLD_LENGTH) {}

  parse(input: PlotInput, navDatabase: NavDatabase): PlotResult {
    return resolveRoute(input.tokens, navDatabase, this.defaultHoldLength);
  }
}
