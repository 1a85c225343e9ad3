import { DEFAULT_HOLD_LENGTH } from './route/RouteGrammar.js';

export interface PlotterConfig {
  /** First word of every plotter command */
  commandPrefix: string;
  /** Shown at the end of the help text when set */
  helpUrl?: string;
  /** Hold leg length when a hold suffix gives none (nm) */
  defaultHoldLength: number;
}

export const DEFAULT_COMMAND_PREFIX = '.plot';

/**
 * Read plotter settings from the environment:
 *   PLOTTER_COMMAND_PREFIX       (default ".plot")
 *   PLOTTER_HELP_URL             (optional)
 *   PLOTTER_DEFAULT_HOLD_LENGTH  (default 4)
 */
export function loadPlotterConfig(env: NodeJS.ProcessEnv = process.env): PlotterConfig {
  const commandPrefix = env.PLOTTER_COMMAND_PREFIX?.trim() || DEFAULT_COMMAND_PREFIX;

  let defaultHoldLength = parseInt(env.PLOTTER_DEFAULT_HOLD_LENGTH ?? String(DEFAULT_HOLD_LENGTH), 10);
  if (Number.isNaN(defaultHoldLength) || defaultHoldLength < 0) {
    console.warn(
      `[Config] Ignoring PLOTTER_DEFAULT_HOLD_LENGTH="${env.PLOTTER_DEFAULT_HOLD_LENGTH}", using ${DEFAULT_HOLD_LENGTH}`
    );
    defaultHoldLength = DEFAULT_HOLD_LENGTH;
  }

  const config: PlotterConfig = { commandPrefix, defaultHoldLength };
  const helpUrl = env.PLOTTER_HELP_URL?.trim();
  if (helpUrl) config.helpUrl = helpUrl;
  return config;
}
