export { RoutePlotter, type RoutePlotterOptions } from './commands/RoutePlotter.js';
export { PlotCommandParser, type PlotCommand } from './commands/PlotCommandParser.js';
export { loadPlotterConfig, DEFAULT_COMMAND_PREFIX, type PlotterConfig } from './config.js';
export { MemoryNavDatabase } from './data/MemoryNavDatabase.js';
export { RouteStore, type RoutesListener } from './store/RouteStore.js';
export { CoordsSource, decodeLegacyCoords, decodeSymbol } from './sources/CoordsSource.js';
export { RouteSource, resolveRoute } from './sources/RouteSource.js';
export type { PlotInput, PlotSource } from './sources/PlotSource.js';
export {
  parseRouteGrammar,
  isCoordinateName,
  DIRECT,
  DEFAULT_HOLD_LENGTH,
  type ParsedRoute,
  type RoutePoint,
} from './route/RouteGrammar.js';
export { parseCoordinate } from './route/coordinates.js';
export { NavigationResolver, type ResolvedNavigation } from './route/NavigationResolver.js';
export { PathStitcher } from './route/PathStitcher.js';
