/**
 * Fragment resolver.
 *
 * A locus annotated across several coordinate rows shows up as one ID
 * repeated in the coordinate file. Each occurrence gets a `#FG<n>` suffix,
 * numbered from 1 per ID in file order, and the group size is written back
 * to the unified table as `fragmentCount` of the unsuffixed ID.
 *
 * When no ID repeats, both tables are returned as they came in and nothing
 * is rewritten.
 */

import type { Logger } from "../logging/index.js";
import { Table } from "../tables/index.js";
import type { CoordinateRecord, Projection } from "../types/index.js";

export const FRAGMENT_GROUP_PREFIX = "#FG";

const FRAGMENT_GROUP_SUFFIX = /#FG\d+$/;

export interface FragmentResolution {
  readonly coordinates: Table<CoordinateRecord>;
  readonly projections: Table<Projection>;
  /** False when the short-circuit applied */
  readonly fragmented: boolean;
  /** Fragmented ID → group size */
  readonly groups: ReadonlyMap<string, number>;
}

/**
 * Projection ID a coordinate row belongs to: the row ID without its
 * fragment-group suffix.
 */
export function coordinateKey(id: string): string {
  return id.replace(FRAGMENT_GROUP_SUFFIX, "");
}

export class FragmentResolver {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  resolve(coordinates: Table<CoordinateRecord>, projections: Table<Projection>): FragmentResolution {
    const groups = new Map<string, number>();
    for (const [id, count] of coordinates.duplicateKeys((row) => row.id)) {
      groups.set(id, count);
    }

    if (groups.size === 0) {
      this.logger.debug("No fragmented projections in coordinate file", {
        rows: coordinates.size,
      });
      return { coordinates, projections, fragmented: false, groups };
    }

    const counters = new Map<string, number>();
    const suffixed = coordinates.map((row): CoordinateRecord => {
      if (!groups.has(row.id)) {
        return row;
      }
      const n = (counters.get(row.id) ?? 0) + 1;
      counters.set(row.id, n);
      return { ...row, id: `${row.id}${FRAGMENT_GROUP_PREFIX}${n}` };
    });

    let annotated = 0;
    const counted = projections.map((row): Projection => {
      const count = counters.get(row.queryTranscript);
      if (count === undefined) {
        return row.fragmentCount === 0 ? row : { ...row, fragmentCount: 0 };
      }
      annotated++;
      return { ...row, fragmentCount: count };
    });

    const fragmentRows = [...groups.values()].reduce((sum, count) => sum + count, 0);
    this.logger.info("Resolved fragmented projections", {
      groups: groups.size,
      fragmentRows,
      annotatedProjections: annotated,
    });
    if (annotated < groups.size) {
      this.logger.debug("Fragment groups without a unified table row", {
        groups: groups.size - annotated,
      });
    }

    return { coordinates: suffixed, projections: counted, fragmented: true, groups };
  }
}

export function resolveFragments(
  coordinates: Table<CoordinateRecord>,
  projections: Table<Projection>,
  logger: Logger
): FragmentResolution {
  return new FragmentResolver(logger).resolve(coordinates, projections);
}
