/**
 * In-memory table capability used by every stage.
 *
 * A Table is an immutable, ordered list of rows whose absent values are
 * explicit `null` cells. Each operation returns a new Table; fills only ever
 * target null cells, so "has this value been set" is answered by the type,
 * not by truthiness.
 */

/** Any record type; absent cells are typed `| null` by the row type. */
export type Row = object;

export class Table<R extends Row> {
  readonly rows: readonly R[];

  constructor(rows: readonly R[]) {
    this.rows = Object.freeze([...rows]);
  }

  static empty<R extends Row>(): Table<R> {
    return new Table<R>([]);
  }

  get size(): number {
    return this.rows.length;
  }

  [Symbol.iterator](): Iterator<R> {
    return this.rows[Symbol.iterator]();
  }

  filter(predicate: (row: R, index: number) => boolean): Table<R> {
    return new Table(this.rows.filter(predicate));
  }

  map<S extends Row>(fn: (row: R, index: number) => S): Table<S> {
    return new Table(this.rows.map(fn));
  }

  concat(other: Table<R>): Table<R> {
    return new Table([...this.rows, ...other.rows]);
  }

  column<K extends keyof R>(key: K): R[K][] {
    return this.rows.map((row) => row[key]);
  }

  /**
   * Set of the non-null values of a column.
   */
  distinct<K extends keyof R>(key: K): Set<NonNullable<R[K]>> {
    const values = new Set<NonNullable<R[K]>>();
    for (const row of this.rows) {
      const value = row[key];
      if (value !== null && value !== undefined) {
        values.add(value);
      }
    }
    return values;
  }

  /**
   * Group rows by a derived key, preserving first-appearance order of keys
   * and row order within each group.
   */
  groupBy<K>(keyOf: (row: R) => K): Map<K, R[]> {
    const groups = new Map<K, R[]>();
    for (const row of this.rows) {
      const key = keyOf(row);
      const group = groups.get(key);
      if (group) {
        group.push(row);
      } else {
        groups.set(key, [row]);
      }
    }
    return groups;
  }

  /**
   * Occurrence count of each non-null value of a column.
   */
  valueCounts<K extends keyof R>(key: K): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const row of this.rows) {
      const value = row[key];
      if (value === null || value === undefined) {
        continue;
      }
      const label = String(value);
      counts[label] = (counts[label] ?? 0) + 1;
    }
    return counts;
  }

  /**
   * Non-null keys that occur on more than one row, with their counts.
   */
  duplicateKeys(keyOf: (row: R) => string | null): Map<string, number> {
    const counts = new Map<string, number>();
    for (const row of this.rows) {
      const key = keyOf(row);
      if (key !== null) {
        counts.set(key, (counts.get(key) ?? 0) + 1);
      }
    }
    for (const [key, count] of counts) {
      if (count < 2) {
        counts.delete(key);
      }
    }
    return counts;
  }

  /**
   * Keep the first row for every key; rows with a null key are all kept.
   */
  uniqueBy(keyOf: (row: R) => string | null): Table<R> {
    const seen = new Set<string>();
    return this.filter((row) => {
      const key = keyOf(row);
      if (key === null) {
        return true;
      }
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });
  }

  /**
   * Fill the null cells of one column. Non-null cells are never touched,
   * and a fill that yields null leaves the cell null.
   */
  fillNull<K extends keyof R>(key: K, fill: (row: R) => R[K] | null): Table<R> {
    return this.map<R>((row) => {
      if (row[key] !== null) {
        return row;
      }
      const value = fill(row);
      return value === null ? row : { ...row, [key]: value };
    });
  }

  /**
   * Full outer join on string keys.
   *
   * Every left row is combined with each right row sharing its key (one
   * output row per pair, as in a relational join), or with null when there
   * is none. Right rows left unmatched follow in their own order. Null keys
   * never match.
   */
  outerJoin<S extends Row, O extends Row>(
    right: Table<S>,
    leftKey: (row: R) => string | null,
    rightKey: (row: S) => string | null,
    combine: (left: R | null, right: S | null) => O
  ): Table<O> {
    const index = new Map<string, number[]>();
    right.rows.forEach((row, position) => {
      const key = rightKey(row);
      if (key === null) {
        return;
      }
      const positions = index.get(key);
      if (positions) {
        positions.push(position);
      } else {
        index.set(key, [position]);
      }
    });

    const matched = new Set<number>();
    const output: O[] = [];

    for (const row of this.rows) {
      const key = leftKey(row);
      const positions = key === null ? undefined : index.get(key);
      if (!positions) {
        output.push(combine(row, null));
        continue;
      }
      for (const position of positions) {
        matched.add(position);
        output.push(combine(row, right.rows[position] ?? null));
      }
    }

    right.rows.forEach((row, position) => {
      if (!matched.has(position)) {
        output.push(combine(null, row));
      }
    });

    return new Table(output);
  }
}
