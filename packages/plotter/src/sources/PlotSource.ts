import type { NavDatabase, PlotErrorKind, PlotResult, SourceKind } from '@route-plotter/shared';

/** Arguments of a plot command, after the keyword */
export interface PlotInput {
  /** Whitespace-separated arguments */
  tokens: string[];
  /** Argument text exactly as typed, so labels keep their spaces */
  rawArgs: string;
}

/** One parser strategy, selected by command keyword */
export interface PlotSource {
  readonly kind: SourceKind;
  /** Argument synopsis shown in help, e.g. "<ROUTE>" */
  readonly helpArguments: string;
  readonly helpDescription: string;
  parse(input: PlotInput, navDatabase: NavDatabase): PlotResult;
}

/** Failed plot result */
export function fail(errorKind: PlotErrorKind, error: string): PlotResult & { success: false } {
  return { success: false, error, errorKind };
}
