import path from "node:path";
import fs from "node:fs/promises";
import { createReadStream, createWriteStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import { createGunzip, createGzip } from "node:zlib";
import { ImageError } from "../utils/errors.js";
import { resolveTools, runTool, type ToolConfig } from "../utils/exec.js";
import { ensureSafeRelPath, expandHome, guardPath, safeJoin } from "../utils/paths.js";

export const INITRD_NAME = "initrd.gz";

export interface InitrdAppendOptions {
  /**
   * Path handed to cpio for each file: relative to the base directory (stored
   * that way in the archive) or the file's absolute path.
   */
  inputPath?: "relative" | "absolute";
  tools?: ToolConfig;
}

/**
 * Appends files to a gzip-compressed newc cpio archive named `initrd.gz`.
 *
 * The archive is unpacked, appended to and recompressed inside a private
 * staging directory next to it; only the final rename touches the original
 * path. The archive ends up 0444 and its directory 0555, also on failure.
 *
 * Not safe to run concurrently on the same archive.
 */
export async function appendFilesToInitrd(
  archivePath: string,
  baseDir: string,
  relativePaths: string[],
  options: InitrdAppendOptions = {}
): Promise<void> {
  if (path.basename(expandHome(archivePath)) !== INITRD_NAME) {
    throw new ImageError("InvalidFormat", `Does not seem to be an ${INITRD_NAME} archive: ${archivePath}`, archivePath);
  }
  if (relativePaths.length === 0) {
    throw new ImageError("InvalidArgument", "No files given to append to the initrd");
  }
  const archive = await guardPath(archivePath, "file");
  const base = await guardPath(baseDir, "directory");
  const inputs: string[] = [];
  for (const relPath of relativePaths) {
    ensureSafeRelPath(relPath);
    const absPath = await guardPath(safeJoin(base, relPath), "file");
    inputs.push(options.inputPath === "absolute" ? absPath : relPath);
  }

  const tools = options.tools ?? resolveTools();
  const parent = path.dirname(archive);
  await fs.chmod(archive, 0o644);
  await fs.chmod(parent, 0o755);

  let staging: string | undefined;
  try {
    staging = await fs.mkdtemp(path.join(parent, ".initrd-"));
    const raw = path.join(staging, "initrd");
    const packed = path.join(staging, INITRD_NAME);

    await pipeline(createReadStream(archive), createGunzip(), createWriteStream(raw));

    // cpio reads the file list from stdin, relative to its working directory
    await runTool(
      tools,
      {
        command: tools.cpio,
        args: ["-H", "newc", "-o", "-A", "-F", raw],
        cwd: base,
        input: inputs.join("\n")
      },
      `Failed while appending ${relativePaths.join(", ")} to ${archive}`,
      archive
    );

    await pipeline(createReadStream(raw), createGzip(), createWriteStream(packed));
    await fs.rename(packed, archive);
    tools.logger.debug(`Appended ${inputs.length} file(s) to ${archive}`);
  } finally {
    if (staging) {
      await fs.rm(staging, { recursive: true, force: true });
    }
    await fs.chmod(archive, 0o444);
    await fs.chmod(parent, 0o555);
  }
}

export async function appendToInitrd(
  archivePath: string,
  baseDir: string,
  relativeFilePath: string,
  options: InitrdAppendOptions = {}
): Promise<void> {
  await appendFilesToInitrd(archivePath, baseDir, [relativeFilePath], options);
}
