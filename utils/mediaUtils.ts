import path from 'path';
import type { ContainerKind, MediaEntry, MediaSummary } from '../types';

const CONTAINER_KINDS: Record<string, ContainerKind> = {
  mp4: 'mp4',
  mkv: 'mkv',
};

const MIME_TYPES: Record<ContainerKind, string> = {
  mp4: 'video/mp4',
  mkv: 'video/x-matroska',
};

export const getContainerKind = (filename: string): ContainerKind | null => {
  const ext = path.extname(filename).slice(1).toLowerCase();
  return CONTAINER_KINDS[ext] ?? null;
};

export const getMimeType = (kind: ContainerKind): string => MIME_TYPES[kind];

export const isHiddenName = (name: string): boolean => name.startsWith('.');

/**
 * Builds the catalog key for a path relative to the media root. Separators
 * become "/"; the name is otherwise kept byte for byte, so two files whose
 * names differ only in Unicode normalization keep distinct keys.
 */
export const toCatalogKey = (relativePath: string): string => relativePath.split(path.sep).join('/');

/**
 * Splits a key back into path segments. Returns null for anything that could
 * escape the media root or name a hidden entry.
 */
export const parseCatalogKey = (key: string): string[] | null => {
  if (!key || key.includes('\0') || key.includes('\\')) return null;
  const segments = key.split('/');
  for (const segment of segments) {
    if (!segment || segment === '..' || isHiddenName(segment)) return null;
  }
  return segments;
};

export const formatBytes = (bytes: number, decimals = 2): string => {
  if (!bytes) return '0 B';
  const k = 1024;
  const dm = decimals < 0 ? 0 : decimals;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(dm))} ${sizes[i]}`;
};

export const parseQuality = (filename: string): string | null => {
  const lower = filename.toLowerCase();
  if (lower.includes('.3d.') || lower.includes('.sbs.') || lower.includes('.hou.')) return '3D';
  if (lower.includes('2160p') || lower.includes('4k')) return '4K';
  if (lower.includes('1080p')) return '1080p';
  if (lower.includes('720p')) return '720p';
  if (lower.includes('576p')) return '576p';
  if (lower.includes('480p')) return '480p';
  if (lower.includes('bluray') || lower.includes('remux')) return 'High (BluRay)';
  if (lower.includes('dvdrip') || lower.includes('dvd')) return 'SD (DVD)';
  return null;
};

// Top-level folder under the media root, e.g. "Movies"
export const parseLibraryName = (key: string): string => {
  const segments = key.split('/');
  return segments.length > 1 ? segments[0] : 'Root';
};

export const displayName = (key: string): string => {
  const base = key.split('/').pop() ?? key;
  return base.replace(/\.[^/.]+$/, '');
};

export const toSummary = (entry: MediaEntry): MediaSummary => ({
  key: entry.key,
  name: displayName(entry.key),
  kind: entry.kind,
  size: entry.size,
  sizeHuman: formatBytes(entry.size),
  lastModified: new Date(entry.lastModified).toISOString(),
  library: parseLibraryName(entry.key),
  quality: parseQuality(path.basename(entry.key)),
});
