import path from "node:path";
import { ImageError } from "../utils/errors.js";
import { resolveTools, type ToolConfig } from "../utils/exec.js";
import { createTempDir, removeDirs } from "../utils/fs.js";
import { guardPath, isImagePath } from "../utils/paths.js";
import { applyEdits, type TreeEdit } from "./edits.js";
import { extractIso } from "./extract.js";
import type { InitrdAppendOptions } from "./initrd.js";
import { extractMbr } from "./mbr.js";
import { regenerateMd5sums, type Md5sumsOptions } from "./md5sums.js";
import { repackIso, validateVolumeName } from "./repack.js";

export interface EditPlanContext {
  /** extracted image tree */
  treeRoot: string;
  /** empty directory for files that get staged before injection */
  stagingDir: string;
}

export type EditPlan = TreeEdit[] | ((ctx: EditPlanContext) => Promise<TreeEdit[]>);

export interface InjectOptions {
  input: string;
  output: string;
  volumeName?: string;
  edits?: EditPlan;
  initrdInputPath?: InitrdAppendOptions["inputPath"];
  manifestOrder?: Md5sumsOptions["order"];
  tools?: Partial<ToolConfig>;
}

export interface InjectResult {
  output: string;
  edits: number;
  checksums: number;
}

export const DEFAULT_VOLUME_NAME = "Debian";

/**
 * Extracts an image, applies the edits, regenerates md5sum.txt and repacks
 * the tree into a new hybrid image. The input image is only read. Every
 * temporary directory is removed when this returns or throws; a failed run
 * leaves nothing at `output`. When the run fails its own error is thrown even
 * if cleanup fails too; a cleanup failure after a successful run is an
 * AggregateError.
 */
export async function injectIntoIso(options: InjectOptions): Promise<InjectResult> {
  const input = await guardPath(options.input, "file");
  if (!isImagePath(input)) {
    throw new ImageError("InvalidFormat", `Input file is not an image file: ${input}`, input);
  }
  const output = await guardPath(options.output, "absent");
  await guardPath(output, "parentDirectory");
  const volumeName = options.volumeName ?? DEFAULT_VOLUME_NAME;
  validateVolumeName(volumeName);

  const tools = resolveTools(options.tools);
  const { logger } = tools;
  const temporary: string[] = [];
  const tempDir = async (prefix: string): Promise<string> => {
    const dir = await createTempDir(prefix);
    temporary.push(dir);
    return dir;
  };

  let failed = false;
  try {
    const treeRoot = await tempDir("isoinject-tree-");
    logger.info(`Extracting contents of ${path.basename(input)}...`);
    await extractIso(input, treeRoot, tools);
    logger.ok("ISO extraction complete.");

    logger.info(`Extracting MBR from ${path.basename(input)}...`);
    const mbrFile = path.join(await tempDir("isoinject-mbr-"), "mbr.bin");
    await extractMbr(input, mbrFile);
    logger.ok("MBR extraction complete.");

    const stagingDir = await tempDir("isoinject-staging-");
    const edits = typeof options.edits === "function" ? await options.edits({ treeRoot, stagingDir }) : options.edits ?? [];
    if (edits.length > 0) {
      logger.info(`Applying ${edits.length} edit(s)...`);
      await applyEdits(edits, { treeRoot, scratchDir: stagingDir, tools, initrdInputPath: options.initrdInputPath });
      logger.ok("Edits applied.");
    }

    logger.info("Regenerating MD5 checksums...");
    const entries = await regenerateMd5sums(treeRoot, { order: options.manifestOrder, logger });
    logger.ok("MD5 calculations complete.");

    logger.info("Repacking ISO...");
    await repackIso(output, mbrFile, treeRoot, volumeName, tools);
    logger.success(`ISO file was created successfully at ${output}.`);

    return { output, edits: edits.length, checksums: entries.length };
  } catch (err) {
    failed = true;
    throw err;
  } finally {
    try {
      await removeDirs(temporary);
    } catch (cleanupErr) {
      // a pipeline error takes precedence over cleanup failures
      if (!failed) {
        throw cleanupErr;
      }
      const reason = cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr);
      logger.info(`Temporary files were left behind: ${reason}`);
    }
  }
}
