import type { Movement, MovementMap, RankedGroup, Snapshot, SnapshotEntry } from '../core/record.js';
import { roundTenth, toPercentPoints } from '../extract/numeric.js';

/**
 * Compare one group's ranking with yesterday's for the same group. Ranks are
 * 1-based positions and identity is the exact name string, so spelling
 * variants of one model count as different entities. A name listed more than
 * once pairs its n-th occurrence today with its n-th occurrence yesterday.
 * The result is aligned with `today`.
 */
export function diffGroup(
  today: readonly SnapshotEntry[],
  yesterday: readonly SnapshotEntry[] | undefined
): Movement[] {
  const previousRanks = new Map<string, { rank: number; score: number }[]>();
  (yesterday ?? []).forEach((entry, index) => {
    const ranks = previousRanks.get(entry.name) ?? [];
    ranks.push({ rank: index + 1, score: entry.score });
    previousRanks.set(entry.name, ranks);
  });

  const occurrences = new Map<string, number>();
  return today.map((entry, index): Movement => {
    const occurrence = occurrences.get(entry.name) ?? 0;
    occurrences.set(entry.name, occurrence + 1);

    const previous = previousRanks.get(entry.name)?.[occurrence];
    if (!previous) {
      return { kind: 'new' };
    }

    const todayRank = index + 1;
    const places = previous.rank - todayRank;
    const delta = roundTenth(entry.score - previous.score);
    const detail = delta !== 0 ? { delta } : {};
    return places > 0
      ? { kind: 'up', places, ...detail }
      : places < 0
        ? { kind: 'down', places: -places, ...detail }
        : { kind: 'unchanged', ...detail };
  });
}

/** Project a ranked group onto snapshot entries (percent points, top-K). */
export function toSnapshotEntries(group: RankedGroup, topK: number): SnapshotEntry[] {
  return group.entries.slice(0, topK).map((entry) => ({ name: entry.name, score: toPercentPoints(entry.score) }));
}

/** Build the snapshot persisted for the next run. */
export function buildSnapshot(groups: readonly RankedGroup[], topK: number): Snapshot {
  const snapshot: Snapshot = {};
  for (const group of groups) {
    snapshot[group.id] = toSnapshotEntries(group, topK);
  }
  return snapshot;
}

/**
 * Diff every group against the prior snapshot. Missing snapshots and missing
 * groups mean "no prior data": every entity is then a new entrant.
 */
export function diffSnapshot(groups: readonly RankedGroup[], snapshot: Snapshot | undefined, topK: number): MovementMap {
  const movements: MovementMap = {};
  for (const group of groups) {
    movements[group.id] = diffGroup(toSnapshotEntries(group, topK), snapshot?.[group.id]);
  }
  return movements;
}
