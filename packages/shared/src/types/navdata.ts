import type { Position } from './route.js';

/** Point-like navigation element kinds, looked up by name */
export type NamedPointType = 'fix' | 'vor' | 'ndb' | 'airport';

/** Airway kinds */
export type AirwayType = 'lowAirway' | 'highAirway';

/** Procedure kinds */
export type ProcedureType = 'sid' | 'star';

/** Navigation element tag */
export type NavElementType = NamedPointType | 'runway' | AirwayType | ProcedureType;

/** Fix, VOR, NDB or airport reference point */
export interface NamedPointElement {
  type: NamedPointType;
  /** Identifier (e.g., "WOD", "EGLL") */
  name: string;
  position: Position;
}

/** One physical end of a runway */
export interface RunwayEnd {
  /** Designator (e.g., "27L") */
  id: string;
  /** Threshold position, when the source provides one */
  threshold?: Position;
}

/** Runway with up to two ends */
export interface RunwayElement {
  type: 'runway';
  /** ICAO code of the owning airport */
  airportName: string;
  ends: RunwayEnd[];
}

/** Airway segment; order of positions is significant */
export interface AirwayElement {
  type: AirwayType;
  /** Airway designator (e.g., "L9", "UN57") */
  name: string;
  positions: Position[];
}

/** SID or STAR geometry */
export interface ProcedureElement {
  type: ProcedureType;
  /** Procedure identifier (e.g., "MID3G") */
  name: string;
  /** ICAO code of the owning airport */
  airportName: string;
  /** Runway the procedure is published for */
  runway?: string;
  positions: Position[];
}

/** Navigation database element */
export type NavElement = NamedPointElement | RunwayElement | AirwayElement | ProcedureElement;

/**
 * Externally owned, read-only navigation database.
 * Each resolution walks `elements()` exactly once.
 */
export interface NavDatabase {
  elements(): Iterable<NavElement>;
}

/** Runway entry of an airport-oriented snapshot */
export interface SnapshotRunway {
  /** Designators of both ends, e.g. ["09L", "27R"] */
  ids: string[];
  /** Thresholds in the same order as ids */
  thresholds: Position[];
}

/** SID/STAR entry of an airport-oriented snapshot */
export interface SnapshotProcedure {
  name: string;
  runway?: string;
  positions: Position[];
}

/** Airport entry of an airport-oriented snapshot */
export interface SnapshotAirport {
  icao: string;
  position: Position;
  runways: SnapshotRunway[];
  sids: SnapshotProcedure[];
  stars: SnapshotProcedure[];
}

/** Airport-oriented navigation data, flattened into elements by the plotter */
export interface NavSnapshot {
  airports: SnapshotAirport[];
  fixes: { name: string; position: Position }[];
  vors: { name: string; position: Position }[];
  ndbs: { name: string; position: Position }[];
  airways: { name: string; high: boolean; positions: Position[] }[];
}
