import type { Route } from './route.js';

/**
 * Failure categories of a plot:
 * - malformedInput: bad character, truncated group, unmatched bracket, bad integer
 * - semanticallyInvalid: runway on an inner point, bad hold direction
 * - unresolved: name absent from the navigation database
 * - discontinuous: segment boundary not on the named airway/procedure
 */
export type PlotErrorKind =
  | 'malformedInput'
  | 'semanticallyInvalid'
  | 'unresolved'
  | 'discontinuous';

/** Outcome of parsing one plot description. Failures never carry a partial route. */
export type PlotResult =
  | {
      success: true;
      route: Route;
      /** Explicit route name given in the description */
      name?: string;
    }
  | {
      success: false;
      error: string;
      errorKind: PlotErrorKind;
    };

/** Parser strategies selectable by command keyword */
export type SourceKind = 'coords' | 'route';

/** A line displayed to the operator */
export interface PlotMessage {
  id: string;
  /** Sender column, e.g. "Error" or "" */
  from: string;
  text: string;
  /** Urgent messages flash and stay unread */
  urgent: boolean;
  timestamp: number;
}

/** Result of handling one command line */
export interface CommandOutcome {
  /** False when the line was not addressed to the plotter */
  handled: boolean;
  success: boolean;
  /** Name the route was stored under */
  name?: string;
  error?: string;
}

/** Anything that publishes the named routes and operator messages */
export interface PlotEventSource {
  getRoutes(): ReadonlyMap<string, Route>;
  onRoutesChanged(listener: (routes: ReadonlyMap<string, Route>) => void): () => void;
  onMessage(listener: (message: PlotMessage) => void): () => void;
}
