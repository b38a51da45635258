import path from "node:path";
import os from "node:os";
import fs from "node:fs/promises";
import { ImageError } from "./errors.js";

export type PathKind = "file" | "directory" | "absent" | "parentDirectory";

/** Native separators to "/". On posix a backslash is part of a file name and stays. */
export function toPosixPath(inputPath: string): string {
  return path.sep === "/" ? inputPath : inputPath.split(path.sep).join("/");
}

export function expandHome(inputPath: string): string {
  if (inputPath === "~") {
    return os.homedir();
  }
  if (inputPath.startsWith("~/")) {
    return path.join(os.homedir(), inputPath.slice(2));
  }
  return inputPath;
}

async function statOrNull(targetPath: string) {
  try {
    return await fs.stat(targetPath);
  } catch {
    return null;
  }
}

/**
 * Expands `~`, resolves to an absolute path and checks that the path is of the
 * required kind. Only stats, never touches the file system otherwise.
 */
export async function guardPath(inputPath: string, kind: PathKind): Promise<string> {
  const resolved = path.resolve(expandHome(inputPath));
  switch (kind) {
    case "file": {
      const stat = await statOrNull(resolved);
      if (!stat?.isFile()) {
        throw new ImageError("NotFound", `No such file: ${resolved}`, resolved);
      }
      break;
    }
    case "directory": {
      const stat = await statOrNull(resolved);
      if (!stat?.isDirectory()) {
        throw new ImageError("NotADirectory", `No such directory: ${resolved}`, resolved);
      }
      break;
    }
    case "absent": {
      // lstat so a dangling symlink still counts as occupying the path
      const exists = await fs
        .lstat(resolved)
        .then(() => true)
        .catch(() => false);
      if (exists) {
        throw new ImageError("AlreadyExists", `Path exists and would get overwritten: ${resolved}`, resolved);
      }
      break;
    }
    case "parentDirectory": {
      const parent = path.dirname(resolved);
      const stat = await statOrNull(parent);
      if (!stat?.isDirectory()) {
        throw new ImageError("NotADirectory", `No such directory: ${parent}`, parent);
      }
      break;
    }
  }
  return resolved;
}

export function ensureSafeRelPath(relPath: string): void {
  const posixPath = toPosixPath(relPath);
  if (posixPath.includes("\0")) {
    throw new ImageError("InvalidArgument", `Invalid path contains null byte: ${relPath}`);
  }
  if (!posixPath || posixPath === ".") {
    throw new ImageError("InvalidArgument", `Empty paths are not allowed`);
  }
  if (posixPath.startsWith("/")) {
    throw new ImageError("InvalidArgument", `Absolute paths are not allowed: ${relPath}`);
  }
  const segments = posixPath.split("/");
  for (const segment of segments) {
    if (!segment) {
      throw new ImageError("InvalidArgument", `Invalid path segment in: ${relPath}`);
    }
    if (segment === "..") {
      throw new ImageError("InvalidArgument", `Path traversal is not allowed: ${relPath}`);
    }
  }
}

export function safeJoin(rootDir: string, relPosixPath: string): string {
  ensureSafeRelPath(relPosixPath);
  const relNative = toPosixPath(relPosixPath).split("/").join(path.sep);
  const rootResolved = path.resolve(rootDir);
  const targetResolved = path.resolve(rootResolved, relNative);
  const relative = path.relative(rootResolved, targetResolved);
  if (relative.startsWith("..") || path.isAbsolute(relative)) {
    throw new ImageError("InvalidArgument", `Path escapes root: ${relPosixPath}`);
  }
  return targetResolved;
}

export function isZipPath(targetPath: string): boolean {
  return path.extname(targetPath).toLowerCase() === ".zip";
}

export function isImagePath(targetPath: string): boolean {
  const ext = path.extname(targetPath);
  return ext === ".iso" || ext === ".img";
}
