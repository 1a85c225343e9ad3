import { createStore, type StoreApi } from 'zustand/vanilla';
import type { PlotEventSource, PlotMessage, Route } from '@route-plotter/shared';

export interface PlotStoreState {
  /** Routes currently on the scope, by name */
  routes: ReadonlyMap<string, Route>;
  /** Operator message log, oldest first */
  messages: PlotMessage[];

  setRoutes: (routes: ReadonlyMap<string, Route>) => void;
  pushMessage: (message: PlotMessage) => void;
  clearMessages: () => void;
}

export type PlotStore = StoreApi<PlotStoreState>;

const MAX_MESSAGES = 200;

export function createPlotStore(): PlotStore {
  return createStore<PlotStoreState>()((set) => ({
    routes: new Map(),
    messages: [],

    // Copy so subscribers see a new reference on every change
    setRoutes: (routes) => set({ routes: new Map(routes) }),

    pushMessage: (message) =>
      set((s) => ({
        messages: [...s.messages.slice(-(MAX_MESSAGES - 1)), message],
      })),

    clearMessages: () => set({ messages: [] }),
  }));
}

/**
 * Mirror a plotter's routes and messages into the store.
 * Returns a function that stops mirroring.
 */
export function bindPlotter(source: PlotEventSource, store: PlotStore): () => void {
  const { setRoutes, pushMessage } = store.getState();
  setRoutes(source.getRoutes());

  const offRoutes = source.onRoutesChanged((routes) => setRoutes(routes));
  const offMessages = source.onMessage((message) => pushMessage(message));

  return () => {
    offRoutes();
    offMessages();
  };
}
