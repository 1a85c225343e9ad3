/**
 * Shared navigation fixtures for plotter tests.
 * Made-up coordinates on round numbers so positions compare exactly.
 */
import type { NavSnapshot, Position } from '@route-plotter/shared';
import { MemoryNavDatabase } from '../data/MemoryNavDatabase.js';

// ─── Positions ───────────────────────────────────────────────────────────────

export const EGLL: Position = { lat: 51.5, lon: -0.5 };
export const EGLL_09R: Position = { lat: 51.46, lon: -0.48 };
export const EGLL_27L: Position = { lat: 51.45, lon: -0.43 };
export const EGKK: Position = { lat: 51.15, lon: -0.19 };
export const EGKK_26L: Position = { lat: 51.16, lon: -0.16 };

export const ALPHA: Position = { lat: 51.0, lon: -1.0 };
export const MID: Position = { lat: 51.05, lon: -0.62 };
export const BRAVO: Position = { lat: 50.9, lon: -0.4 };
export const CHARL: Position = { lat: 50.8, lon: -0.1 };
export const SFD: Position = { lat: 50.76, lon: 0.12 };
export const TIMBA: Position = { lat: 50.95, lon: 0.26 };
export const WOD: Position = { lat: 51.45, lon: -0.88 };

/** SID legs off 27L and 09R */
export const SID_27L_1: Position = { lat: 51.44, lon: -0.6 };
export const SID_27L_2: Position = { lat: 51.3, lon: -0.8 };
export const SID_09R_1: Position = { lat: 51.47, lon: -0.3 };

/** STAR leg after TIMBA */
export const STAR_2: Position = { lat: 51.05, lon: 0.0 };

// ─── Snapshot ────────────────────────────────────────────────────────────────

export function makeSnapshot(): NavSnapshot {
  return {
    airports: [
      {
        icao: 'EGLL',
        position: EGLL,
        runways: [
          { ids: ['09L', '27R'], thresholds: [{ lat: 51.48, lon: -0.48 }, { lat: 51.47, lon: -0.43 }] },
          { ids: ['09R', '27L'], thresholds: [EGLL_09R, EGLL_27L] },
        ],
        sids: [
          { name: 'MID3G', runway: '09R', positions: [SID_09R_1, MID] },
          { name: 'MID3G', runway: '27L', positions: [SID_27L_1, SID_27L_2, MID] },
        ],
        stars: [],
      },
      {
        icao: 'EGKK',
        position: EGKK,
        runways: [{ ids: ['08R', '26L'], thresholds: [{ lat: 51.14, lon: -0.21 }, EGKK_26L] }],
        sids: [],
        stars: [{ name: 'TIMBA1X', positions: [SFD, TIMBA, STAR_2] }],
      },
    ],
    fixes: [
      { name: 'ALPHA', position: ALPHA },
      { name: 'BRAVO', position: BRAVO },
      { name: 'CHARL', position: CHARL },
      { name: 'TIMBA', position: TIMBA },
      { name: 'WOD', position: WOD },
    ],
    vors: [
      { name: 'MID', position: MID },
      { name: 'SFD', position: SFD },
    ],
    ndbs: [],
    airways: [
      // Two segments sharing BRAVO; accumulated as ALPHA MID BRAVO CHARL SFD
      { name: 'L9', high: false, positions: [ALPHA, MID, BRAVO] },
      { name: 'L9', high: true, positions: [BRAVO, CHARL, SFD] },
    ],
  };
}

export function makeNavDatabase(): MemoryNavDatabase {
  return MemoryNavDatabase.fromSnapshot(makeSnapshot());
}

/** Strip a route down to comparable lat/lon pairs */
export function latLons(route: { lat: number; lon: number }[]): Position[] {
  return route.map(({ lat, lon }) => ({ lat, lon }));
}
