import type { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import type { ScanFailure, ScannedFile, ScanResult } from './types';
import { describeError } from './errors';
import { getContainerKind, isHiddenName, toCatalogKey } from './utils/mediaUtils';

interface WalkContext {
  root: string;
  visited: Set<string>;
  files: ScannedFile[];
  failures: ScanFailure[];
}

const fail = (ctx: WalkContext, target: string, err: unknown) => {
  ctx.failures.push({ path: target, reason: describeError(err) });
};

async function scanDirectory(ctx: WalkContext, dir: string): Promise<void> {
  // Symlinked directories are entered once per real path, which also breaks cycles.
  let realDir: string;
  try {
    realDir = await fs.realpath(dir);
  } catch (e) {
    fail(ctx, dir, e);
    return;
  }
  if (ctx.visited.has(realDir)) return;
  ctx.visited.add(realDir);

  let dirents: Dirent[];
  try {
    dirents = await fs.readdir(dir, { withFileTypes: true });
  } catch (e) {
    fail(ctx, dir, e);
    return;
  }
  dirents.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const dirent of dirents) {
    const name = dirent.name;
    if (isHiddenName(name)) continue;

    const fullPath = path.join(dir, name);
    let isDirectory = dirent.isDirectory();
    let isFile = dirent.isFile();

    if (dirent.isSymbolicLink()) {
      try {
        const target = await fs.stat(fullPath);
        isDirectory = target.isDirectory();
        isFile = target.isFile();
      } catch (e) {
        fail(ctx, fullPath, e);
        continue;
      }
    }

    if (isDirectory) {
      await scanDirectory(ctx, fullPath);
      continue;
    }

    const kind = getContainerKind(name);
    if (!isFile || !kind) continue;

    try {
      const realFile = await fs.realpath(fullPath);
      if (ctx.visited.has(realFile)) continue;
      ctx.visited.add(realFile);

      const stats = await fs.stat(fullPath);
      if (!stats.isFile() || stats.size === 0) continue;

      const relativePath = path.relative(ctx.root, fullPath);
      ctx.files.push({
        entry: {
          key: toCatalogKey(relativePath),
          absolutePath: fullPath,
          relativePath,
          size: stats.size,
          lastModified: stats.mtimeMs,
          kind,
        },
        identity: `${stats.dev}:${stats.ino}`,
      });
    } catch (e) {
      fail(ctx, fullPath, e);
    }
  }
}

/**
 * Walks `mediaRoot` and collects every playable file. A path that cannot be
 * read is recorded in `failures` and the walk carries on with its siblings.
 */
export async function scanMediaRoot(mediaRoot: string): Promise<ScanResult> {
  const root = path.resolve(mediaRoot);
  console.log(`[Scanner] Starting scan of ${root}...`);

  const ctx: WalkContext = { root, visited: new Set(), files: [], failures: [] };
  await scanDirectory(ctx, root);

  for (const failure of ctx.failures) {
    console.warn(`[Scanner] Skipped ${failure.path}: ${failure.reason}`);
  }
  console.log(`[Scanner] Found ${ctx.files.length} media files (${ctx.failures.length} skipped paths).`);
  return { files: ctx.files, failures: ctx.failures };
}
