import type { Hold, Position } from '@route-plotter/shared';
import { normalizeHeading, offsetFlat } from '@route-plotter/shared';
import type { ScreenPoint } from './rendering/Projection.js';
import { PlotSizes } from './rendering/PlotTheme.js';

// ─── Holds ───────────────────────────────────────────────────────────────────

/** Half-circle turn of a racetrack, in canvas arc terms */
export interface HoldTurn {
  centre: ScreenPoint;
  startAngle: number;
  endAngle: number;
  anticlockwise: boolean;
}

/**
 * Racetrack drawn for a hold. The inbound leg runs from `inboundStart`
 * to the fix (`inboundEnd`); the outbound leg is offset by two turn radii
 * toward the turning side.
 */
export interface HoldGeometry {
  radius: number;
  inboundStart: ScreenPoint;
  inboundEnd: ScreenPoint;
  outboundStart: ScreenPoint;
  outboundEnd: ScreenPoint;
  /** Turn over the fix, inbound end → outbound start */
  fixTurn: HoldTurn;
  /** Turn at the far end, outbound end → inbound start */
  farTurn: HoldTurn;
}

/**
 * Start of the inbound leg: `hold.length` nm back along the inbound course.
 * Flat-earth approximation, fine over a few miles.
 */
export function holdInboundStart(fix: Position, hold: Hold): Position {
  return offsetFlat(fix, normalizeHeading(hold.course + 180), hold.length);
}

/** Semicircle around `centre` starting at `from`, bulging toward `bulge` */
function turn(centre: ScreenPoint, from: ScreenPoint, bulge: ScreenPoint): HoldTurn {
  const startAngle = Math.atan2(from.y - centre.y, from.x - centre.x);
  // Canvas arcs sweep through startAngle + π/2 when drawn clockwise
  const mid = startAngle + Math.PI / 2;
  const clockwiseBulge = Math.cos(mid) * bulge.x + Math.sin(mid) * bulge.y;
  return {
    centre,
    startAngle,
    endAngle: startAngle + Math.PI,
    anticlockwise: clockwiseBulge < 0,
  };
}

/**
 * Racetrack for a hold given the projected fix and inbound leg start.
 * Returns null for holds with no length.
 */
export function holdGeometry(
  fix: ScreenPoint,
  start: ScreenPoint,
  hold: Hold
): HoldGeometry | null {
  if (!(hold.length > 0)) return null;

  const leg = { x: start.x - fix.x, y: start.y - fix.y };
  const mul = (hold.leftTurns ? -1 : 1) * (PlotSizes.holdRadius / hold.length);
  const rad = { x: leg.y * mul, y: -leg.x * mul };

  const fixCentre = { x: fix.x + rad.x, y: fix.y + rad.y };
  const farCentre = { x: start.x + rad.x, y: start.y + rad.y };
  const outboundStart = { x: fixCentre.x + rad.x, y: fixCentre.y + rad.y };
  const outboundEnd = { x: farCentre.x + rad.x, y: farCentre.y + rad.y };

  return {
    radius: Math.hypot(rad.x, rad.y),
    inboundStart: start,
    inboundEnd: fix,
    outboundStart,
    outboundEnd,
    fixTurn: turn(fixCentre, fix, { x: -leg.x, y: -leg.y }),
    farTurn: turn(farCentre, outboundEnd, leg),
  };
}

// ─── Labels ──────────────────────────────────────────────────────────────────

/** Route name drawn along the path, rotated to the segment */
export interface PathLabel {
  text: string;
  x: number;
  y: number;
  /** Segment angle in radians, counter-clockwise from screen +x */
  angle: number;
}

/**
 * Place `text` every `interval` px along the segment `from` → `to`.
 * `carry` is the distance travelled since the previous label on earlier
 * segments; the returned `carry` continues the spacing onto the next one.
 */
export function pathLabels(
  from: ScreenPoint,
  to: ScreenPoint,
  text: string,
  interval: number,
  carry: number
): { labels: PathLabel[]; carry: number } {
  if (!(interval > 0)) return { labels: [], carry };

  const length = Math.hypot(to.x - from.x, to.y - from.y);
  const angle = Math.atan((from.y - to.y) / (to.x - from.x));
  const labels: PathLabel[] = [];

  for (let target = interval; target < carry + length; target += interval) {
    const t = (target - carry) / length;
    labels.push({
      text,
      x: (1 - t) * from.x + t * to.x,
      y: (1 - t) * from.y + t * to.y,
      angle,
    });
  }

  return { labels, carry: (carry + length) % interval };
}

/** Axis-aligned label box in pixels */
export interface LabelBox {
  text: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

function overlaps(a: LabelBox, b: LabelBox): boolean {
  return a.x < b.x + b.width && b.x < a.x + a.width && a.y < b.y + b.height && b.y < a.y + a.height;
}

/** Keep labels in order, dropping any that would overlap one already kept */
export function placePointLabels(candidates: LabelBox[]): LabelBox[] {
  const placed: LabelBox[] = [];
  for (const candidate of candidates) {
    if (!placed.some((box) => overlaps(box, candidate))) placed.push(candidate);
  }
  return placed;
}
