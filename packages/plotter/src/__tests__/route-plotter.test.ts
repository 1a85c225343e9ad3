/**
 * Command layer tests
 *
 * Covers: command parsing and raw-argument preservation, help text,
 * plotting into the named-route store, auto-naming, clearing, atomic
 * failure handling and operator messages.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import type { PlotMessage, Route } from '@route-plotter/shared';
import { PlotCommandParser } from '../commands/PlotCommandParser.js';
import { RoutePlotter } from '../commands/RoutePlotter.js';
import { RouteStore } from '../store/RouteStore.js';
import type { PlotterConfig } from '../config.js';
import { MID, SFD, latLons, makeNavDatabase } from './fixtures.js';

const CONFIG: PlotterConfig = { commandPrefix: '.plot', defaultHoldLength: 4 };

// ─── Parser ──────────────────────────────────────────────────────────────────

describe('PlotCommandParser', () => {
  const parser = new PlotCommandParser();

  it('ignores lines for other commands', () => {
    expect(parser.parse('.other route')).toEqual({ type: 'ignored' });
    expect(parser.parse('   ')).toEqual({ type: 'ignored' });
  });

  it('shows help for a bare prefix or "help"', () => {
    expect(parser.parse('.plot')).toEqual({ type: 'help' });
    expect(parser.parse('.plot help')).toEqual({ type: 'help' });
  });

  it('parses clear with and without names', () => {
    expect(parser.parse('.plot clear')).toEqual({ type: 'clear', names: [] });
    expect(parser.parse('.plot clear A B')).toEqual({ type: 'clear', names: ['A', 'B'] });
  });

  it('selects a source by keyword and keeps the raw argument text', () => {
    expect(parser.parse('.plot  coords LHR   IzcnAbp(A  B)')).toEqual({
      type: 'plot',
      source: 'coords',
      input: {
        tokens: ['LHR', 'IzcnAbp(A', 'B)'],
        rawArgs: 'LHR   IzcnAbp(A  B)',
      },
    });
  });

  it('falls back to the route source for unknown keywords', () => {
    expect(parser.parse('.plot MID L9 SFD')).toEqual({
      type: 'plot',
      source: 'route',
      input: { tokens: ['MID', 'L9', 'SFD'], rawArgs: 'MID L9 SFD' },
    });
  });

  it('matches keywords case-sensitively', () => {
    const command = parser.parse('.plot ROUTE MID');
    expect(command).toMatchObject({ type: 'plot', source: 'route' });
    if (command.type === 'plot') expect(command.input.tokens).toEqual(['ROUTE', 'MID']);
  });

  it('honours a custom prefix', () => {
    const custom = new PlotCommandParser('.route');
    expect(custom.parse('.route help')).toEqual({ type: 'help' });
    expect(custom.parse('.plot help')).toEqual({ type: 'ignored' });
  });
});

// ─── Plotter ─────────────────────────────────────────────────────────────────

describe('RoutePlotter', () => {
  let store: RouteStore;
  let plotter: RoutePlotter;
  let messages: PlotMessage[];
  let changes: number;

  beforeEach(() => {
    store = new RouteStore();
    plotter = new RoutePlotter({ navDatabase: makeNavDatabase(), config: CONFIG, store });
    messages = [];
    changes = 0;
    plotter.onMessage((message) => messages.push(message));
    plotter.onRoutesChanged(() => {
      changes++;
    });
  });

  it('does not handle foreign commands', () => {
    expect(plotter.handleCommand('.connect EGLL')).toEqual({ handled: false, success: false });
    expect(messages).toEqual([]);
  });

  it('stores a plotted route under the next automatic name', () => {
    const outcome = plotter.handleCommand('.plot route MID L9 SFD');
    expect(outcome).toEqual({ handled: true, success: true, name: '1' });
    expect(latLons(store.get('1') ?? [])).toHaveLength(4);
    expect(changes).toBe(1);
  });

  it('stores under an explicit name', () => {
    expect(plotter.handleCommand('.plot EVENING MID DCT SFD').name).toBe('EVENING');
    expect(latLons(plotter.getRoutes().get('EVENING') ?? [])).toEqual([MID, SFD]);
  });

  it('advances the automatic name on failed attempts too', () => {
    plotter.handleCommand('.plot MID DCT NOPE');
    expect(plotter.handleCommand('.plot MID DCT SFD').name).toBe('2');
  });

  it('plots legacy coordinate strings', () => {
    const outcome = plotter.handleCommand('.plot coords LHR IzcnAbp(LONDON HEATHROW)');
    expect(outcome).toEqual({ handled: true, success: true, name: 'LHR' });
    expect(store.get('LHR')?.[0].label).toBe('LONDON HEATHROW');
  });

  it('does not store an empty route', () => {
    const outcome = plotter.handleCommand('.plot coords @');
    expect(outcome).toEqual({ handled: true, success: true, name: '1' });
    expect(store.size).toBe(0);
    expect(changes).toBe(0);
  });

  it('leaves a stored route untouched when a replacement fails', () => {
    plotter.handleCommand('.plot KEEP MID DCT SFD');
    const before: Route | undefined = store.get('KEEP');

    const outcome = plotter.handleCommand('.plot KEEP MID DCT NOPE');
    expect(outcome).toEqual({
      handled: true,
      success: false,
      error: "could not find point 'NOPE'",
    });
    expect(store.get('KEEP')).toBe(before);
    expect(changes).toBe(1);
  });

  it('shows failures as urgent error messages', () => {
    plotter.handleCommand('.plot coords IzcnAbp*');
    expect(messages).toHaveLength(1);
    expect(messages[0]).toMatchObject({
      from: 'Error',
      text: "invalid structural character '*'",
      urgent: true,
    });
    expect(messages[0].id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('replaces a route plotted again under the same name', () => {
    plotter.handleCommand('.plot R MID DCT SFD');
    plotter.handleCommand('.plot R SFD DCT MID');
    expect(latLons(store.get('R') ?? [])).toEqual([SFD, MID]);
  });

  it('clears named routes', () => {
    plotter.handleCommand('.plot A MID DCT SFD');
    plotter.handleCommand('.plot B MID DCT SFD');
    expect(plotter.handleCommand('.plot clear A')).toEqual({ handled: true, success: true });
    expect([...store.all().keys()]).toEqual(['B']);
  });

  it('clears all routes', () => {
    plotter.handleCommand('.plot A MID DCT SFD');
    plotter.handleCommand('.plot B MID DCT SFD');
    plotter.handleCommand('.plot clear');
    expect(store.size).toBe(0);
  });

  it('reports a missing route argument', () => {
    expect(plotter.handleCommand('.plot route')).toMatchObject({
      success: false,
      error: 'missing route',
    });
    expect(plotter.handleCommand('.plot coords')).toMatchObject({
      success: false,
      error: 'missing string',
    });
  });

  it('unsubscribes listeners', () => {
    const unsubscribe = plotter.onMessage(() => {
      throw new Error('should not be called');
    });
    unsubscribe();
    plotter.handleCommand('.plot MID DCT NOPE');
    expect(messages).toHaveLength(1);
  });
});

// ─── Help ────────────────────────────────────────────────────────────────────

describe('RoutePlotter help', () => {
  it('lists every command aligned to the widest synopsis', () => {
    const plotter = new RoutePlotter({ navDatabase: makeNavDatabase(), config: CONFIG });
    expect(plotter.helpLines()).toEqual([
      'Available commands:',
      '  .plot help                   - Display this help text',
      '  .plot clear [NAME]...        - Remove the named plot, or all plots',
      '  .plot coords [NAME] <STRING> - Plot a string of coordinates, encoded in the legacy format',
      '  .plot route [NAME] <ROUTE>   - Plot a flight plan route',
      '  .plot [NAME] <ROUTE>         - Shortcut for ".plot route [NAME] <ROUTE>"',
    ]);
  });

  it('ends with the help URL when configured', () => {
    const plotter = new RoutePlotter({
      navDatabase: makeNavDatabase(),
      config: { ...CONFIG, helpUrl: 'https://example.test/plotter' },
    });
    const lines = plotter.helpLines();
    expect(lines[lines.length - 1]).toBe('See <https://example.test/plotter> for more information.');
  });

  it('displays the help text as messages', () => {
    const plotter = new RoutePlotter({ navDatabase: makeNavDatabase(), config: CONFIG });
    const seen: PlotMessage[] = [];
    plotter.onMessage((m) => seen.push(m));
    expect(plotter.handleCommand('.plot')).toEqual({ handled: true, success: true });
    expect(seen.map((m) => m.text)).toEqual(plotter.helpLines());
    expect(seen.every((m) => m.from === '' && !m.urgent)).toBe(true);
  });
});
