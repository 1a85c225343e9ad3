import type { Route } from '@route-plotter/shared';
import { isDiscontinuity, splitPolylines } from '@route-plotter/shared';
import { PlotColors, PlotFonts, PlotSizes, routeColour } from '../rendering/PlotTheme.js';
import type { Projection, ScreenPoint } from '../rendering/Projection.js';
import {
  holdGeometry,
  holdInboundStart,
  pathLabels,
  placePointLabels,
  type HoldGeometry,
  type LabelBox,
  type PathLabel,
} from '../routeGeometry.js';

/** The slice of the 2D canvas API the route overlay draws with */
export interface OverlayContext {
  strokeStyle: string | CanvasGradient | CanvasPattern;
  fillStyle: string | CanvasGradient | CanvasPattern;
  lineWidth: number;
  font: string;
  textBaseline: CanvasTextBaseline;
  save(): void;
  restore(): void;
  beginPath(): void;
  moveTo(x: number, y: number): void;
  lineTo(x: number, y: number): void;
  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number, counterclockwise?: boolean): void;
  stroke(): void;
  translate(x: number, y: number): void;
  rotate(angle: number): void;
  fillText(text: string, x: number, y: number): void;
  measureText(text: string): { width: number };
  createLinearGradient(x0: number, y0: number, x1: number, y1: number): CanvasGradient;
}

/**
 * Plotted routes drawn over the scope: gradient polylines, holding
 * racetracks, the route name repeated along each path, then point markers
 * and their labels on top.
 * Redraws whenever the routes or the view change.
 */
export class RouteLayer {
  private readonly ctx: OverlayContext;
  private readonly projection: Projection;

  constructor(ctx: OverlayContext, projection: Projection) {
    this.ctx = ctx;
    this.projection = projection;
  }

  draw(routes: ReadonlyMap<string, Route>, width: number, height: number): void {
    const ctx = this.ctx;
    ctx.lineWidth = PlotSizes.strokeWidth;
    ctx.font = `${PlotFonts.size}px ${PlotFonts.family}`;
    ctx.textBaseline = 'top';

    const interval = PlotSizes.labelInterval * height;
    const labels: PathLabel[] = [];
    let carry = 0;

    // Paths and holds
    for (const [name, route] of routes) {
      const n = route.length - 1;
      const fraction = (i: number) => (n > 0 ? i / n : 0);
      let previous: ScreenPoint | null = null;

      for (let i = 0; i <= n; i++) {
        const node = route[i];
        if (isDiscontinuity(node)) continue;

        const point = this.projection.project(node);

        if (node.hold) {
          const start = this.projection.project(holdInboundStart(node, node.hold));
          const geometry = holdGeometry(point, start, node.hold);
          if (geometry) this.drawHold(geometry, routeColour(fraction(i)));
        }

        if (previous && i > 0 && !isDiscontinuity(route[i - 1])) {
          const gradient = ctx.createLinearGradient(previous.x, previous.y, point.x, point.y);
          gradient.addColorStop(0, routeColour(fraction(i - 1)));
          gradient.addColorStop(1, routeColour(fraction(i)));
          ctx.strokeStyle = gradient;
          ctx.beginPath();
          ctx.moveTo(previous.x, previous.y);
          ctx.lineTo(point.x, point.y);
          ctx.stroke();

          if (point.x >= 0 && point.x <= width && point.y >= 0 && point.y <= height) {
            const placed = pathLabels(previous, point, name, interval, carry);
            labels.push(...placed.labels);
            carry = placed.carry;
          }
        }

        previous = point;
      }
    }

    ctx.fillStyle = PlotColors.pathLabel;
    for (const label of labels) {
      ctx.save();
      ctx.translate(label.x, label.y);
      ctx.rotate(-label.angle);
      ctx.fillText(label.text, 0, 0);
      ctx.restore();
    }

    this.drawPoints(routes);
  }

  private drawHold(geometry: HoldGeometry, colour: string): void {
    const ctx = this.ctx;
    const { fixTurn, farTurn, radius } = geometry;

    ctx.strokeStyle = colour;
    ctx.beginPath();
    ctx.moveTo(geometry.inboundEnd.x, geometry.inboundEnd.y);
    ctx.arc(fixTurn.centre.x, fixTurn.centre.y, radius, fixTurn.startAngle, fixTurn.endAngle, fixTurn.anticlockwise);
    ctx.lineTo(geometry.outboundEnd.x, geometry.outboundEnd.y);
    ctx.arc(farTurn.centre.x, farTurn.centre.y, radius, farTurn.startAngle, farTurn.endAngle, farTurn.anticlockwise);
    ctx.lineTo(geometry.inboundEnd.x, geometry.inboundEnd.y);
    ctx.stroke();
  }

  private drawPoints(routes: ReadonlyMap<string, Route>): void {
    const ctx = this.ctx;
    const candidates: LabelBox[] = [];

    ctx.strokeStyle = PlotColors.point;
    for (const route of routes.values()) {
      for (const run of splitPolylines(route)) {
        for (const node of run) {
          const point = this.projection.project(node);
          const r = node.highlight ? PlotSizes.highlightRadius : PlotSizes.pointRadius;

          ctx.beginPath();
          ctx.arc(point.x, point.y, r, 0, Math.PI * 2);
          ctx.stroke();

          if (node.label) {
            candidates.push({
              text: node.label,
              x: point.x + r + PlotSizes.labelGap,
              y: point.y - PlotFonts.size / 2,
              width: ctx.measureText(node.label).width,
              height: PlotFonts.size,
            });
          }
        }
      }
    }

    ctx.fillStyle = PlotColors.point;
    for (const box of placePointLabels(candidates)) {
      ctx.fillText(box.text, box.x, box.y);
    }
  }
}
