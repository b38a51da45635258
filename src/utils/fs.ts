import fs from "node:fs/promises";
import path from "node:path";
import { createReadStream, createWriteStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import os from "node:os";
import fg from "fast-glob";
import { safeJoin } from "./paths.js";

export interface ListFilesOptions {
  /** sort entries by path; otherwise directory walk order is kept */
  sort?: boolean;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Regular files under `rootDir` as posix paths relative to it. Symlinked
 * directories are not descended into and symlinks to files are left out.
 */
export async function listFiles(rootDir: string, options: ListFilesOptions = {}): Promise<string[]> {
  const entries = await fg("**/*", {
    cwd: rootDir,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false,
    unique: true
  });
  const files: string[] = [];
  // fast-glob already separates entries with "/"
  for (const relPath of entries) {
    const stat = await fs.lstat(safeJoin(rootDir, relPath));
    if (stat.isFile()) {
      files.push(relPath);
    }
  }
  if (options.sort ?? true) {
    files.sort();
  }
  return files;
}

export async function copyFileStream(srcPath: string, destPath: string): Promise<void> {
  await ensureDir(path.dirname(destPath));
  await pipeline(createReadStream(srcPath), createWriteStream(destPath));
}

/**
 * Copies every file of `srcDir` into `destDir`. Existing destination files are
 * made owner-writable first so read-only files from an image can be replaced.
 */
export async function copyDir(srcDir: string, destDir: string): Promise<string[]> {
  await ensureDir(destDir);
  const files = await listFiles(srcDir);
  for (const relPath of files) {
    const srcPath = safeJoin(srcDir, relPath);
    const destPath = safeJoin(destDir, relPath);
    const existing = await fs.lstat(destPath).catch(() => null);
    if (existing?.isFile()) {
      await fs.chmod(destPath, existing.mode | 0o200);
    }
    await copyFileStream(srcPath, destPath);
  }
  return files;
}

/**
 * Grants owner write permission on `paths` for the duration of `fn` and puts
 * the original modes back afterwards, also when `fn` throws. Paths that do not
 * exist are skipped.
 */
export async function withWritable<T>(paths: string[], fn: () => Promise<T>): Promise<T> {
  const restore: Array<{ target: string; mode: number }> = [];
  try {
    for (const target of paths) {
      const stat = await fs.lstat(target).catch(() => null);
      if (!stat || stat.isSymbolicLink()) {
        continue;
      }
      const mode = stat.mode & 0o7777;
      restore.push({ target, mode });
      await fs.chmod(target, mode | 0o200);
    }
    return await fn();
  } finally {
    for (const { target, mode } of restore.reverse()) {
      // the target may have been removed by fn
      if (await pathExists(target)) {
        await fs.chmod(target, mode);
      }
    }
  }
}

export async function createTempDir(prefix: string): Promise<string> {
  const base = path.join(os.tmpdir(), prefix);
  return fs.mkdtemp(base);
}

/** Adds owner rwx to every directory of a tree so it can be removed. */
export async function makeTreeWritable(rootDir: string): Promise<void> {
  const dirs = await fg("**/*", {
    cwd: rootDir,
    dot: true,
    onlyDirectories: true,
    followSymbolicLinks: false,
    absolute: true
  });
  for (const dir of [rootDir, ...dirs]) {
    const stat = await fs.lstat(dir);
    await fs.chmod(dir, (stat.mode & 0o7777) | 0o700);
  }
}

export async function removeDir(targetPath: string): Promise<void> {
  if (!(await pathExists(targetPath))) {
    return;
  }
  await makeTreeWritable(targetPath);
  await fs.rm(targetPath, { recursive: true, force: true });
}

/**
 * Removes `dirs` newest first. Every removal is attempted; failures are
 * thrown together afterwards.
 */
export async function removeDirs(dirs: string[], remove: (dir: string) => Promise<void> = removeDir): Promise<void> {
  const failures: unknown[] = [];
  for (const dir of [...dirs].reverse()) {
    try {
      await remove(dir);
    } catch (err) {
      failures.push(err);
    }
  }
  if (failures.length > 0) {
    const noun = failures.length === 1 ? "directory" : "directories";
    throw new AggregateError(failures, `Could not remove ${failures.length} temporary ${noun}`);
  }
}
