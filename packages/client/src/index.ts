export * from './radar/rendering/Projection.js';
export * from './radar/rendering/PlotTheme.js';
export * from './radar/routeGeometry.js';
export * from './radar/layers/RouteLayer.js';
export * from './state/PlotStore.js';
