interface Snapshottable {
  /** Captures current state and returns a function that restores it. */
  snapshot(): () => void;
}

/**
 * Keyed rows held in memory. Rows are replaced, never mutated in place,
 * so a shallow copy of the map is a consistent snapshot.
 */
export class InMemoryTable<T> implements Snapshottable {
  private rows = new Map<string, T>();

  constructor(database?: InMemoryDatabase) {
    database?.track(this);
  }

  get(key: string): T | undefined {
    return this.rows.get(key);
  }

  has(key: string): boolean {
    return this.rows.has(key);
  }

  set(key: string, row: T): void {
    this.rows.set(key, row);
  }

  delete(key: string): boolean {
    return this.rows.delete(key);
  }

  values(): T[] {
    return [...this.rows.values()];
  }

  get size(): number {
    return this.rows.size;
  }

  snapshot(): () => void {
    const copy = new Map(this.rows);
    return () => {
      this.rows = copy;
    };
  }
}

/**
 * Serialises transactions over a set of tables. A transaction that rejects
 * restores every tracked table to the state it saw on entry. Transactions
 * must not nest.
 */
export class InMemoryDatabase {
  private readonly tables: Snapshottable[] = [];
  private tail: Promise<void> = Promise.resolve();

  track(table: Snapshottable): void {
    this.tables.push(table);
  }

  transaction<T>(work: () => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const restores = this.tables.map((table) => table.snapshot());
      try {
        return await work();
      } catch (error) {
        restores.forEach((restore) => restore());
        throw error;
      }
    };

    const result = this.tail.then(run);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
