import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Snapshot, SnapshotEntry } from '../core/record.js';

/** Persistence collaborator for the day-over-day snapshot. */
export interface SnapshotStore {
  /** Prior snapshot; empty when missing or unreadable. Never rejects for bad data. */
  load(): Promise<Snapshot>;
  /** Replace the stored snapshot wholesale. */
  save(snapshot: Snapshot): Promise<void>;
}

/** JSON file snapshot store. Last write wins; callers serialize runs. */
export class FileSnapshotStore implements SnapshotStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async load(): Promise<Snapshot> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch {
      return {};
    }

    try {
      return parseSnapshot(JSON.parse(raw));
    } catch {
      return {};
    }
  }

  async save(snapshot: Snapshot): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf8');
  }
}

/** In-process store used by tests and dry runs. */
export class MemorySnapshotStore implements SnapshotStore {
  private snapshot: Snapshot;

  constructor(initial: Snapshot = {}) {
    this.snapshot = initial;
  }

  async load(): Promise<Snapshot> {
    return this.snapshot;
  }

  async save(snapshot: Snapshot): Promise<void> {
    this.snapshot = snapshot;
  }
}

/**
 * Keep only well-formed groups and entries from an untrusted snapshot value;
 * anything that is not an object yields an empty snapshot.
 */
export function parseSnapshot(input: unknown): Snapshot {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return {};
  }

  const snapshot: Snapshot = {};
  for (const [groupId, entries] of Object.entries(input)) {
    if (!Array.isArray(entries)) {
      continue;
    }
    snapshot[groupId] = entries.filter(isSnapshotEntry);
  }
  return snapshot;
}

/** Narrow one persisted `(name, score)` pair. */
function isSnapshotEntry(value: unknown): value is SnapshotEntry {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'name' in value &&
    typeof value.name === 'string' &&
    'score' in value &&
    typeof value.score === 'number' &&
    Number.isFinite(value.score)
  );
}
