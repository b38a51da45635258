import path from "node:path";
import fs from "node:fs/promises";
import { ImageError } from "../utils/errors.js";
import { listFiles, pathExists } from "../utils/fs.js";
import { hashFile } from "../utils/hash.js";
import { silentLogger, type Logger } from "../utils/log.js";
import { guardPath, safeJoin } from "../utils/paths.js";

export const MANIFEST_NAME = "md5sum.txt";

export interface Md5sumEntry {
  digest: string;
  path: string;
}

export interface Md5sumsOptions {
  /** "sorted" (default) orders entries by path, "walk" keeps directory walk order */
  order?: "sorted" | "walk";
  /** files hashed at the same time */
  concurrency?: number;
  /** digest of one file; MD5 of its contents unless replaced */
  hasher?: (filePath: string) => Promise<string>;
  logger?: Logger;
}

export interface Md5sumsReport {
  checked: number;
  mismatched: string[];
  missing: string[];
}

const ENTRY_PATTERN = /^([0-9a-f]{32}) {2}(.+)$/;

export function formatMd5sums(entries: Md5sumEntry[]): string {
  return entries.map((entry) => `${entry.digest}  ${entry.path}\n`).join("");
}

export function parseMd5sums(text: string): Md5sumEntry[] {
  const entries: Md5sumEntry[] = [];
  const lines = text.split("\n");
  lines.forEach((line, index) => {
    if (!line) {
      return;
    }
    const match = ENTRY_PATTERN.exec(line);
    if (!match) {
      throw new ImageError("InvalidFormat", `Invalid ${MANIFEST_NAME} line ${index + 1}: ${line}`);
    }
    entries.push({ digest: match[1], path: match[2] });
  });
  return entries;
}

async function mapWithConcurrency<T, R>(items: T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  // once one call fails the other workers take no new items
  let failed = false;
  const worker = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index]);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  };
  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

/**
 * Rewrites `md5sum.txt` at the root of an extracted image with one line per
 * regular file. The old manifest is removed before the walk, so the new one
 * never lists itself. Symlinks are not listed or followed.
 *
 * Every digest is computed before the manifest is written; if hashing fails
 * there is no manifest afterwards. The manifest ends up 0444 and the root
 * 0555 either way.
 */
export async function regenerateMd5sums(treeRoot: string, options: Md5sumsOptions = {}): Promise<Md5sumEntry[]> {
  const root = await guardPath(treeRoot, "directory");
  const manifest = path.join(root, MANIFEST_NAME);
  const logger = options.logger ?? silentLogger;
  const hasher = options.hasher ?? hashFile;

  await fs.chmod(root, 0o755);
  try {
    if (await pathExists(manifest)) {
      await fs.chmod(manifest, 0o644);
      await fs.unlink(manifest);
    }

    const files = await listFiles(root, { sort: (options.order ?? "sorted") === "sorted" });
    const entries = await mapWithConcurrency(files, options.concurrency ?? 8, async (relPath) => ({
      digest: await hasher(safeJoin(root, relPath)),
      path: relPath
    }));

    try {
      await fs.writeFile(manifest, formatMd5sums(entries), { flag: "wx" });
    } catch (err) {
      await fs.rm(manifest, { force: true });
      throw err;
    }
    logger.debug(`Wrote ${entries.length} checksum(s) to ${manifest}`);
    return entries;
  } finally {
    if (await pathExists(manifest)) {
      await fs.chmod(manifest, 0o444);
    }
    await fs.chmod(root, 0o555);
  }
}

/** Re-hashes every file listed in the tree's manifest. */
export async function verifyMd5sums(treeRoot: string): Promise<Md5sumsReport> {
  const root = await guardPath(treeRoot, "directory");
  const manifest = path.join(root, MANIFEST_NAME);
  if (!(await pathExists(manifest))) {
    throw new ImageError("NotFound", `No such file: ${manifest}`, manifest);
  }
  const entries = parseMd5sums(await fs.readFile(manifest, "utf8"));
  const report: Md5sumsReport = { checked: entries.length, mismatched: [], missing: [] };
  for (const entry of entries) {
    const absPath = safeJoin(root, entry.path.replace(/^\.\//, ""));
    if (!(await pathExists(absPath))) {
      report.missing.push(entry.path);
      continue;
    }
    if ((await hashFile(absPath)) !== entry.digest) {
      report.mismatched.push(entry.path);
    }
  }
  return report;
}
