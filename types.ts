export type ContainerKind = 'mp4' | 'mkv';

export interface MediaEntry {
  key: string;
  absolutePath: string;
  relativePath: string;
  size: number;
  lastModified: number;
  kind: ContainerKind;
}

// Listing view handed to the UI. Never carries the absolute path.
export interface MediaSummary {
  key: string;
  name: string;
  kind: ContainerKind;
  size: number;
  sizeHuman: string;
  lastModified: string;
  library: string;
  quality: string | null;
}

export interface ByteRange {
  start: number;
  end: number; // inclusive
  length: number;
}

export type RangeRequestOutcome =
  | { type: 'full' }
  | { type: 'partial'; ranges: ByteRange[] }
  | { type: 'unsatisfiable'; length: number };

export interface ScanFailure {
  path: string;
  reason: string;
}

export interface ScannedFile {
  entry: MediaEntry;
  // device:inode of the target, used to spot renames between scans
  identity: string;
}

export interface ScanResult {
  files: ScannedFile[];
  failures: ScanFailure[];
}

export interface ScanReport {
  entries: number;
  added: string[];
  removed: string[];
  changed: string[];
  renamed: { from: string; to: string }[];
  failures: ScanFailure[];
  durationMs: number;
}

export interface ScanStatus {
  isRunning: boolean;
  step: 'Idle' | 'Scanning' | 'Complete' | 'Error';
  lastScanAt: string | null;
  entryCount: number;
  failureCount: number;
  lastError: string | null;
}

export type SortField = 'name' | 'date' | 'size';
export type SortOrder = 'asc' | 'desc';

export interface LibraryStats {
  totalVideos: number;
  totalBytes: number;
  formats: Record<ContainerKind, number>;
}
