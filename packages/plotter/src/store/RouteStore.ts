import type { Route } from '@route-plotter/shared';

export type RoutesListener = (routes: ReadonlyMap<string, Route>) => void;

/**
 * RouteStore: the named routes currently on the scope.
 * Owned by the command layer; the resolution core never touches it.
 */
export class RouteStore {
  private routes = new Map<string, Route>();
  private nameCounter = 0;
  private listeners = new Set<RoutesListener>();

  /** Next automatic route name ("1", "2", ...) */
  nextName(): string {
    this.nameCounter += 1;
    return String(this.nameCounter);
  }

  /** Store or replace a route */
  set(name: string, route: Route): void {
    this.routes.set(name, route);
    this.notify();
  }

  get(name: string): Route | undefined {
    return this.routes.get(name);
  }

  has(name: string): boolean {
    return this.routes.has(name);
  }

  /** Remove the named routes; returns how many existed */
  delete(names: string[]): number {
    let removed = 0;
    for (const name of names) {
      if (this.routes.delete(name)) removed++;
    }
    this.notify();
    return removed;
  }

  /** Remove every route; returns how many there were */
  clear(): number {
    const removed = this.routes.size;
    this.routes.clear();
    this.notify();
    return removed;
  }

  get size(): number {
    return this.routes.size;
  }

  /** Read-only view of all routes */
  all(): ReadonlyMap<string, Route> {
    return this.routes;
  }

  /** Subscribe to changes; returns an unsubscribe function */
  onChange(listener: RoutesListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    for (const listener of this.listeners) listener(this.routes);
  }
}
