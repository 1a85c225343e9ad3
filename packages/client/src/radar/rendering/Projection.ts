import type { Position } from '@route-plotter/shared';
import { stereographicProject } from '@route-plotter/shared';

export interface ScreenPoint {
  x: number;
  y: number;
}

/** Maps geographic positions onto canvas pixels */
export interface Projection {
  project(position: Position): ScreenPoint;
}

/**
 * Wraps stereographic projection with a fixed centre and range.
 * Converts lat/lon positions to screen pixel coordinates.
 */
export class StereographicProjection implements Projection {
  /** Center of the projection */
  private readonly center: Position;
  /** Range in nautical miles (radius of visible area) */
  private readonly rangeNm: number;
  /** Canvas width/height in pixels */
  private canvasWidth = 0;
  private canvasHeight = 0;

  constructor(center: Position, rangeNm = 40) {
    this.center = center;
    this.rangeNm = rangeNm;
  }

  /** Update canvas dimensions */
  setCanvasSize(width: number, height: number): void {
    this.canvasWidth = width;
    this.canvasHeight = height;
  }

  /** Pixels per nautical mile based on current range and canvas size */
  getScale(): number {
    const minDim = Math.min(this.canvasWidth, this.canvasHeight);
    return minDim / (2 * this.rangeNm);
  }

  /** Convert lat/lon to screen pixel coordinates */
  project(pos: Position): ScreenPoint {
    const projected = stereographicProject(pos, this.center);
    const scale = this.getScale();

    return {
      x: this.canvasWidth / 2 + projected.x * scale,
      y: this.canvasHeight / 2 - projected.y * scale, // Y is inverted on screen
    };
  }
}
