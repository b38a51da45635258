import path from "node:path";
import fs from "node:fs/promises";
import fg from "fast-glob";
import { ImageError } from "../utils/errors.js";
import { copyDir, listFiles, pathExists, removeDir, withWritable } from "../utils/fs.js";
import { resolveTools, type ToolConfig } from "../utils/exec.js";
import { ensureSafeRelPath, guardPath, isZipPath, safeJoin } from "../utils/paths.js";
import { extractZip } from "../utils/zip.js";
import { appendFilesToInitrd, type InitrdAppendOptions } from "./initrd.js";

/** Copies an overlay directory or `.zip` bundle over the tree root. */
export interface CopyEdit {
  type: "copy";
  source: string;
}

/** Replaces every occurrence of `placeholder` in the files matched by `patterns`. */
export interface SubstituteEdit {
  type: "substitute";
  patterns: string[];
  placeholder: string;
  value: string;
}

/** Removes a subtree. A subtree that is not there is left alone. */
export interface DeleteEdit {
  type: "delete";
  path: string;
}

/** Appends files found under `baseDir` to an initrd.gz inside the tree. */
export interface InitrdEdit {
  type: "initrd";
  archive: string;
  baseDir: string;
  files: string[];
}

export type TreeEdit = CopyEdit | SubstituteEdit | DeleteEdit | InitrdEdit;

export interface EditContext {
  treeRoot: string;
  /** scratch space for unpacking overlay bundles, owned by the caller */
  scratchDir: string;
  tools?: ToolConfig;
  initrdInputPath?: InitrdAppendOptions["inputPath"];
}

/** The tree root and every directory between it and `relPath`, root first. */
function ancestorsWithin(root: string, relPath: string): string[] {
  const dirs = [root];
  const segments = path.posix.dirname(relPath).split("/").filter((segment) => segment && segment !== ".");
  let current = root;
  for (const segment of segments) {
    current = path.join(current, segment);
    dirs.push(current);
  }
  return dirs;
}

async function applyCopy(edit: CopyEdit, ctx: EditContext): Promise<void> {
  let sourceDir: string;
  if (isZipPath(edit.source)) {
    const bundle = await guardPath(edit.source, "file");
    sourceDir = await fs.mkdtemp(path.join(ctx.scratchDir, "overlay-"));
    await extractZip(bundle, sourceDir);
  } else {
    sourceDir = await guardPath(edit.source, "directory");
  }

  const files = await listFiles(sourceDir);
  const touched = new Set<string>();
  for (const relPath of files) {
    for (const dir of ancestorsWithin(ctx.treeRoot, relPath)) {
      touched.add(dir);
    }
    touched.add(safeJoin(ctx.treeRoot, relPath));
  }
  await withWritable([...touched], async () => {
    await copyDir(sourceDir, ctx.treeRoot);
  });
}

/** Byte-level replace-all; undefined when `search` does not occur. */
function replaceBytes(content: Buffer, search: Buffer, replacement: Buffer): Buffer | undefined {
  let index = content.indexOf(search);
  if (index === -1) {
    return undefined;
  }
  const parts: Buffer[] = [];
  let start = 0;
  while (index !== -1) {
    parts.push(content.subarray(start, index), replacement);
    start = index + search.length;
    index = content.indexOf(search, start);
  }
  parts.push(content.subarray(start));
  return Buffer.concat(parts);
}

async function applySubstitute(edit: SubstituteEdit, ctx: EditContext): Promise<void> {
  if (!edit.placeholder) {
    throw new ImageError("InvalidArgument", "Substitution placeholder must not be empty");
  }
  // bytes outside the placeholder are written back untouched, whatever their encoding
  const placeholder = Buffer.from(edit.placeholder, "utf8");
  const value = Buffer.from(edit.value, "utf8");
  const matches = await fg(edit.patterns, {
    cwd: ctx.treeRoot,
    dot: true,
    onlyFiles: true,
    followSymbolicLinks: false
  });
  for (const relPath of matches.sort()) {
    const filePath = safeJoin(ctx.treeRoot, relPath);
    const replaced = replaceBytes(await fs.readFile(filePath), placeholder, value);
    if (!replaced) {
      continue;
    }
    await withWritable([filePath], async () => {
      await fs.writeFile(filePath, replaced);
    });
  }
}

async function applyDelete(edit: DeleteEdit, ctx: EditContext): Promise<void> {
  ensureSafeRelPath(edit.path);
  const target = safeJoin(ctx.treeRoot, edit.path);
  if (!(await pathExists(target))) {
    return;
  }
  await withWritable([path.dirname(target)], async () => {
    await removeDir(target);
  });
}

export async function applyEdit(edit: TreeEdit, ctx: EditContext): Promise<void> {
  switch (edit.type) {
    case "copy":
      return applyCopy(edit, ctx);
    case "substitute":
      return applySubstitute(edit, ctx);
    case "delete":
      return applyDelete(edit, ctx);
    case "initrd":
      return appendFilesToInitrd(safeJoin(ctx.treeRoot, edit.archive), edit.baseDir, edit.files, {
        inputPath: ctx.initrdInputPath,
        tools: ctx.tools ?? resolveTools()
      });
  }
}

/** Applies edits in order; the first failure stops the rest. */
export async function applyEdits(edits: TreeEdit[], ctx: EditContext): Promise<void> {
  for (const edit of edits) {
    ctx.tools?.logger.debug(`Applying ${edit.type} edit`);
    await applyEdit(edit, ctx);
  }
}
