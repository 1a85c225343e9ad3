import type { NavDatabase, NavElement, NavSnapshot, RunwayEnd } from '@route-plotter/shared';

/**
 * In-memory navigation database. Elements are enumerated in insertion
 * order, which decides the winner when several share a name.
 */
export class MemoryNavDatabase implements NavDatabase {
  private readonly items: NavElement[];

  constructor(elements: Iterable<NavElement> = []) {
    this.items = [...elements];
  }

  add(...elements: NavElement[]): this {
    this.items.push(...elements);
    return this;
  }

  get size(): number {
    return this.items.length;
  }

  *elements(): Generator<NavElement> {
    yield* this.items;
  }

  /**
   * Flatten airport-oriented data into elements: airports, runways,
   * fixes, VORs, NDBs, airways, SIDs, STARs.
   */
  static fromSnapshot(snapshot: NavSnapshot): MemoryNavDatabase {
    const db = new MemoryNavDatabase();

    for (const airport of snapshot.airports) {
      db.add({ type: 'airport', name: airport.icao, position: airport.position });
    }

    for (const airport of snapshot.airports) {
      for (const runway of airport.runways) {
        const ends = runway.ids.map((id, k): RunwayEnd => {
          const threshold = runway.thresholds[k];
          return threshold ? { id, threshold } : { id };
        });
        db.add({ type: 'runway', airportName: airport.icao, ends });
      }
    }

    for (const fix of snapshot.fixes) db.add({ type: 'fix', ...fix });
    for (const vor of snapshot.vors) db.add({ type: 'vor', ...vor });
    for (const ndb of snapshot.ndbs) db.add({ type: 'ndb', ...ndb });

    for (const airway of snapshot.airways) {
      db.add({
        type: airway.high ? 'highAirway' : 'lowAirway',
        name: airway.name,
        positions: airway.positions,
      });
    }

    for (const airport of snapshot.airports) {
      for (const sid of airport.sids) {
        db.add({ type: 'sid', airportName: airport.icao, ...sid });
      }
    }
    for (const airport of snapshot.airports) {
      for (const star of airport.stars) {
        db.add({ type: 'star', airportName: airport.icao, ...star });
      }
    }

    console.log(
      `[NavDatabase] Loaded ${db.size} elements from ${snapshot.airports.length} airport(s)`
    );
    return db;
  }
}
