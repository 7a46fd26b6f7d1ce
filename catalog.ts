import fs from 'fs/promises';
import path from 'path';
import type {
  LibraryStats,
  MediaEntry,
  ScanReport,
  ScanResult,
  ScanStatus,
  SortField,
  SortOrder,
} from './types';
import { describeError, errorCode } from './errors';
import { scanMediaRoot } from './scanner';
import { displayName, getContainerKind, parseCatalogKey, toCatalogKey } from './utils/mediaUtils';

export type Scanner = (root: string) => Promise<ScanResult>;

interface Snapshot {
  entries: ReadonlyMap<string, MediaEntry>;
  identities: ReadonlyMap<string, string>;
  // NFC form -> key, or null when several keys share the form.
  normalized: ReadonlyMap<string, string | null>;
}

const EMPTY_SNAPSHOT: Snapshot = { entries: new Map(), identities: new Map(), normalized: new Map() };

export function diffSnapshots(previous: Snapshot, next: Snapshot): Omit<ScanReport, 'failures' | 'durationMs'> {
  let added = [...next.entries.keys()].filter(key => !previous.entries.has(key));
  let removed = [...previous.entries.keys()].filter(key => !next.entries.has(key));
  const renamed: ScanReport['renamed'] = [];

  const addedByIdentity = new Map<string, string>();
  for (const key of added) {
    const identity = next.identities.get(key);
    if (identity) addedByIdentity.set(identity, key);
  }
  for (const key of removed) {
    const identity = previous.identities.get(key);
    if (!identity) continue;
    const to = addedByIdentity.get(identity);
    if (!to) continue;
    renamed.push({ from: key, to });
    addedByIdentity.delete(identity);
  }
  if (renamed.length > 0) {
    const from = new Set(renamed.map(r => r.from));
    const to = new Set(renamed.map(r => r.to));
    added = added.filter(key => !to.has(key));
    removed = removed.filter(key => !from.has(key));
  }

  const changed: string[] = [];
  for (const [key, entry] of next.entries) {
    const before = previous.entries.get(key);
    if (before && (before.size !== entry.size || before.lastModified !== entry.lastModified)) {
      changed.push(key);
    }
  }

  return { entries: next.entries.size, added, removed, changed, renamed };
}

/**
 * In-memory index of the media root.
 *
 * Each scan builds a complete snapshot aside and replaces the current one in a
 * single assignment, so readers see either the old index or the new one.
 * `resolve` always re-stats the file: sizes and timestamps in the snapshot are
 * only as fresh as the last scan.
 */
export class CatalogIndex {
  readonly root: string;
  private readonly scanner: Scanner;
  private snapshot: Snapshot = EMPTY_SNAPSHOT;
  private inFlight: Promise<ScanReport> | null = null;
  private scanStatus: ScanStatus = {
    isRunning: false,
    step: 'Idle',
    lastScanAt: null,
    entryCount: 0,
    failureCount: 0,
    lastError: null,
  };

  constructor(mediaRoot: string, scanner: Scanner = scanMediaRoot) {
    this.root = path.resolve(mediaRoot);
    this.scanner = scanner;
  }

  /** Rescans the root. Calls made while a scan runs share its result. */
  scan(): Promise<ScanReport> {
    if (this.inFlight) return this.inFlight;
    this.inFlight = this.runScan().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async runScan(): Promise<ScanReport> {
    const started = Date.now();
    this.scanStatus = { ...this.scanStatus, isRunning: true, step: 'Scanning', lastError: null };

    try {
      const result = await this.scanner(this.root);
      const entries = new Map<string, MediaEntry>();
      const identities = new Map<string, string>();
      const normalized = new Map<string, string | null>();
      for (const file of result.files) {
        const { key } = file.entry;
        entries.set(key, Object.freeze({ ...file.entry }));
        identities.set(key, file.identity);
        const form = key.normalize('NFC');
        normalized.set(form, normalized.has(form) ? null : key);
      }
      const next: Snapshot = { entries, identities, normalized };
      const diff = diffSnapshots(this.snapshot, next);
      this.snapshot = next;

      const report: ScanReport = { ...diff, failures: result.failures, durationMs: Date.now() - started };
      this.scanStatus = {
        isRunning: false,
        step: 'Complete',
        lastScanAt: new Date().toISOString(),
        entryCount: entries.size,
        failureCount: result.failures.length,
        lastError: null,
      };
      console.log(
        `[Catalog] ${report.entries} entries (+${report.added.length} -${report.removed.length} ` +
          `~${report.changed.length} renamed ${report.renamed.length}) in ${report.durationMs}ms`
      );
      return report;
    } catch (e) {
      this.scanStatus = { ...this.scanStatus, isRunning: false, step: 'Error', lastError: describeError(e) };
      throw e;
    }
  }

  isScanning(): boolean {
    return this.inFlight !== null;
  }

  status(): ScanStatus {
    return { ...this.scanStatus };
  }

  /**
   * Looks up `key` and stats the file now. Returns null when the file is gone
   * or is no longer a regular file, even if the last scan listed it.
   *
   * A key that names no file exactly may still match a listed entry under
   * Unicode normalization (a client that rewrote "e\u0301" as "\u00e9"), as
   * long as only one entry has that normalized form.
   */
  async resolve(key: string): Promise<MediaEntry | null> {
    const exact = await this.statEntry(this.snapshot.entries.get(key) ?? this.locate(key));
    if (exact) return exact;

    const alias = this.snapshot.normalized.get(key.normalize('NFC'));
    if (!alias || alias === key) return null;
    return this.statEntry(this.snapshot.entries.get(alias) ?? null);
  }

  private async statEntry(target: MediaEntry | null): Promise<MediaEntry | null> {
    if (!target) return null;

    try {
      const stats = await fs.stat(target.absolutePath);
      if (!stats.isFile()) return null;
      return { ...target, size: stats.size, lastModified: stats.mtimeMs };
    } catch (e) {
      const code = errorCode(e);
      if (code !== 'ENOENT' && code !== 'ENOTDIR') {
        console.warn(`[Catalog] Cannot stat ${target.relativePath}: ${describeError(e)}`);
      }
      return null;
    }
  }

  // Maps a key the last scan has not seen yet onto a path under the root.
  private locate(key: string): MediaEntry | null {
    const segments = parseCatalogKey(key);
    if (!segments) return null;
    const relativePath = path.join(...segments);
    const kind = getContainerKind(relativePath);
    if (!kind || toCatalogKey(relativePath) !== key) return null;
    return {
      key,
      absolutePath: path.join(this.root, relativePath),
      relativePath,
      size: 0,
      lastModified: 0,
      kind,
    };
  }

  list(sort: SortField = 'name', order: SortOrder = 'asc'): MediaEntry[] {
    const entries = [...this.snapshot.entries.values()];
    const direction = order === 'desc' ? -1 : 1;
    const compare = (a: MediaEntry, b: MediaEntry): number => {
      switch (sort) {
        case 'date':
          return a.lastModified - b.lastModified;
        case 'size':
          return a.size - b.size;
        case 'name':
          return displayName(a.key).toLowerCase().localeCompare(displayName(b.key).toLowerCase());
      }
    };
    return entries.sort((a, b) => direction * compare(a, b) || a.key.localeCompare(b.key));
  }

  stats(): LibraryStats {
    const stats: LibraryStats = { totalVideos: 0, totalBytes: 0, formats: { mp4: 0, mkv: 0 } };
    for (const entry of this.snapshot.entries.values()) {
      stats.totalVideos += 1;
      stats.totalBytes += entry.size;
      stats.formats[entry.kind] += 1;
    }
    return stats;
  }
}
