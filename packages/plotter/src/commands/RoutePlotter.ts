import type {
  CommandOutcome,
  NavDatabase,
  PlotEventSource,
  PlotMessage,
  Route,
  SourceKind,
} from '@route-plotter/shared';
import { v4 as uuid } from 'uuid';
import { loadPlotterConfig, type PlotterConfig } from '../config.js';
import { CoordsSource } from '../sources/CoordsSource.js';
import type { PlotSource } from '../sources/PlotSource.js';
import { RouteSource } from '../sources/RouteSource.js';
import { RouteStore } from '../store/RouteStore.js';
import { PlotCommandParser } from './PlotCommandParser.js';

/** Narrowest help column, fits "clear [NAME]..." */
const MIN_HELP_WIDTH = 15;
/** Room for " [NAME] " around each source synopsis */
const NAME_SYNOPSIS_WIDTH = 8;

export interface RoutePlotterOptions {
  navDatabase: NavDatabase;
  config?: PlotterConfig;
  store?: RouteStore;
}

type MessageListener = (message: PlotMessage) => void;

/**
 * RoutePlotter: the command layer. Parses ".plot" lines, runs the chosen
 * source against the navigation database and keeps the named routes.
 * A failed plot leaves the stored routes untouched.
 */
export class RoutePlotter implements PlotEventSource {
  private readonly navDatabase: NavDatabase;
  private readonly config: PlotterConfig;
  private readonly store: RouteStore;
  private readonly parser: PlotCommandParser;
  private readonly sources: Record<SourceKind, PlotSource>;
  private readonly messageListeners = new Set<MessageListener>();

  constructor(options: RoutePlotterOptions) {
    this.navDatabase = options.navDatabase;
    this.config = options.config ?? loadPlotterConfig();
    this.store = options.store ?? new RouteStore();
    this.parser = new PlotCommandParser(this.config.commandPrefix);
    this.sources = {
      coords: new CoordsSource(),
      route: new RouteSource(this.config.defaultHoldLength),
    };
  }

  /** Handle one command line */
  handleCommand(text: string): CommandOutcome {
    const command = this.parser.parse(text);

    switch (command.type) {
      case 'ignored':
        return { handled: false, success: false };

      case 'help':
        for (const line of this.helpLines()) this.display('', line);
        return { handled: true, success: true };

      case 'clear': {
        const removed =
          command.names.length > 0 ? this.store.delete(command.names) : this.store.clear();
        console.log(`[RoutePlotter] Cleared ${removed} route(s)`);
        return { handled: true, success: true };
      }

      case 'plot': {
        // Auto-names advance on every attempt, successful or not
        const autoName = this.store.nextName();
        const result = this.sources[command.source].parse(command.input, this.navDatabase);

        if (!result.success) {
          console.warn(`[RoutePlotter] ${command.source} failed (${result.errorKind}): ${result.error}`);
          this.display('Error', result.error, true);
          return { handled: true, success: false, error: result.error };
        }

        const name = result.name ?? autoName;
        if (result.route.length > 0) {
          this.store.set(name, result.route);
          console.log(`[RoutePlotter] Plotted "${name}" with ${result.route.length} node(s)`);
        }
        return { handled: true, success: true, name };
      }
    }
  }

  /** Help text, one display line per entry */
  helpLines(): string[] {
    const sources = Object.values(this.sources);
    const width = Math.max(
      MIN_HELP_WIDTH,
      ...sources.map((s) => s.kind.length + s.helpArguments.length + NAME_SYNOPSIS_WIDTH)
    );

    const line = (command: string, help: string) =>
      `  ${this.config.commandPrefix} ${command.padEnd(width)} - ${help}`;

    const lines = [
      'Available commands:',
      line('help', 'Display this help text'),
      line('clear [NAME]...', 'Remove the named plot, or all plots'),
      ...sources.map((s) => line(`${s.kind} [NAME] ${s.helpArguments}`, s.helpDescription)),
      line('[NAME] <ROUTE>', `Shortcut for "${this.config.commandPrefix} route [NAME] <ROUTE>"`),
    ];

    if (this.config.helpUrl) {
      lines.push(`See <${this.config.helpUrl}> for more information.`);
    }
    return lines;
  }

  getRoutes(): ReadonlyMap<string, Route> {
    return this.store.all();
  }

  onRoutesChanged(listener: (routes: ReadonlyMap<string, Route>) => void): () => void {
    return this.store.onChange(listener);
  }

  onMessage(listener: MessageListener): () => void {
    this.messageListeners.add(listener);
    return () => {
      this.messageListeners.delete(listener);
    };
  }

  private display(from: string, text: string, urgent = false): void {
    const message: PlotMessage = {
      id: uuid(),
      from,
      text,
      urgent,
      timestamp: Date.now(),
    };
    for (const listener of this.messageListeners) listener(message);
  }
}
