/**
 * Route overlay colours, fonts and sizes.
 *
 * Each route is stroked with a gradient running red → magenta → blue
 * from its first node to its last, so direction of flight reads at a glance.
 */

/**
 * Gradient colour at fraction `t` (0..1) along a route.
 * 0 is pure red, 0.5 magenta, 1 pure blue.
 */
export function routeColour(t: number): string {
  const x = Math.trunc(255 * (1 - Math.abs(1 - t * 2)));
  const r = t < 0.5 ? 255 : x;
  const b = t > 0.5 ? 255 : x;
  return `rgb(${r}, 0, ${b})`;
}

export const PlotColors = {
  /** Route name repeated along the path */
  pathLabel: '#dddddd',
  /** Point markers and point labels */
  point: '#ffffff',
} as const;

export const PlotFonts = {
  family: "'Share Tech Mono', 'Courier New', monospace",
  size: 12,
} as const;

/** Overlay sizes */
export const PlotSizes = {
  /** Holding pattern turn radius (nm) */
  holdRadius: 2,
  /** Route stroke width (px) */
  strokeWidth: 1,
  /** Spacing of path labels as a fraction of the viewport height */
  labelInterval: 0.25,
  /** Point marker radius (px) */
  pointRadius: 1,
  /** Marker radius of a highlighted point (px) */
  highlightRadius: 4,
  /** Gap between a point marker and its label (px) */
  labelGap: 4,
} as const;
