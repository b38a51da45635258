import path from "node:path";
import fs from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { ImageError } from "../utils/errors.js";
import { resolveTools, runTool, type ToolConfig } from "../utils/exec.js";
import { guardPath } from "../utils/paths.js";

export const BIOS_BOOT_IMAGE = "isolinux/isolinux.bin";
export const BOOT_CATALOG = "isolinux/boot.cat";
export const EFI_BOOT_IMAGE = "boot/grub/efi.img";

const INVALID_VOLUME_CHAR = /[^A-Za-z0-9 ._-]/;

/** Throws InvalidArgument naming the first character outside `[A-Za-z0-9 ._-]`. */
export function validateVolumeName(volumeName: string): void {
  if (volumeName.length === 0) {
    throw new ImageError("InvalidArgument", "Filesystem name must not be empty");
  }
  const match = INVALID_VOLUME_CHAR.exec(volumeName);
  if (match) {
    throw new ImageError("InvalidArgument", `Invalid character in filesystem name: '${match[0]}'`);
  }
}

/** mkisofs-compatible arguments for a hybrid BIOS/EFI image. */
export function buildMkisofsArgs(outputImage: string, mbrFile: string, treeRoot: string, volumeName: string): string[] {
  return [
    "-as", "mkisofs",
    "-r", "-V", volumeName,
    "-o", outputImage,
    "-J", "-J", "-joliet-long", "-cache-inodes",
    "-isohybrid-mbr", mbrFile,
    "-b", BIOS_BOOT_IMAGE,
    "-c", BOOT_CATALOG,
    "-boot-load-size", "4", "-boot-info-table", "-no-emul-boot",
    "-eltorito-alt-boot",
    "-e", EFI_BOOT_IMAGE, "-no-emul-boot",
    "-isohybrid-gpt-basdat", "-isohybrid-apm-hfsplus",
    treeRoot
  ];
}

/**
 * Builds a hybrid bootable image from an extracted tree and the MBR of the
 * image it came from. xorriso writes to a hidden sibling of `outputImage`
 * that is renamed into place only once it succeeded.
 */
export async function repackIso(
  outputImage: string,
  mbrFile: string,
  treeRoot: string,
  volumeName: string,
  tools: ToolConfig = resolveTools()
): Promise<string> {
  const output = await guardPath(outputImage, "absent");
  await guardPath(output, "parentDirectory");
  const mbr = await guardPath(mbrFile, "file");
  const root = await guardPath(treeRoot, "directory");
  validateVolumeName(volumeName);

  const partial = path.join(path.dirname(output), `.${path.basename(output)}.${randomUUID().slice(0, 8)}.partial`);
  try {
    await runTool(
      tools,
      { command: tools.xorriso, args: buildMkisofsArgs(partial, mbr, root, volumeName) },
      `Failed while repacking ISO from source files: ${root}`,
      root
    );
    await guardPath(output, "absent");
    await fs.rename(partial, output);
  } finally {
    await fs.rm(partial, { force: true });
  }
  return output;
}
