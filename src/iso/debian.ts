import path from "node:path";
import { copyFileStream } from "../utils/fs.js";
import { guardPath } from "../utils/paths.js";
import type { TreeEdit } from "./edits.js";

export interface DebianRelease {
  /** token used in `install.<arch>` */
  arch: string;
  dist: string;
  /** "testing" for releases whose preseeds pull from testing, else empty */
  testing: string;
}

export const LOGO_INITRD_PATH = "usr/share/graphics/logo_debian.png";

export function initrdPathFor(arch: string): string {
  return `install.${arch}/gtk/initrd.gz`;
}

/** Guesses architecture and distribution from an installer image's file name. */
export function detectDebianRelease(imageName: string): DebianRelease {
  const name = path.basename(imageName);
  const arch = name.includes("amd64") ? "amd" : "386";
  const dist = name.includes("debian-12") ? "bookworm" : "bullseye";
  return { arch, dist, testing: dist === "bookworm" ? "testing" : "" };
}

export interface DebianPlanOptions {
  release: DebianRelease;
  /** overlay directory or bundle copied over the image root */
  overlay?: string;
  /** PNG staged into the initrd as the installer logo */
  logo?: string;
  /** directory the logo is staged in; must be writable and owned by the caller */
  stagingDir: string;
}

/**
 * Edits used on Debian installer images: drop the unused Xen kernel variant,
 * copy the overlay, fill in the release placeholders and put the logo into
 * the graphical installer's initrd.
 */
export async function planDebianEdits(options: DebianPlanOptions): Promise<TreeEdit[]> {
  const { arch, dist, testing } = options.release;
  const edits: TreeEdit[] = [{ type: "delete", path: `install.${arch}/xen` }];

  if (options.overlay) {
    edits.push({ type: "copy", source: options.overlay });
  }
  edits.push(
    { type: "substitute", patterns: ["isolinux/menu.cfg"], placeholder: "__ARCH__", value: arch },
    { type: "substitute", patterns: ["preseeds/*"], placeholder: "__DIST__", value: dist },
    { type: "substitute", patterns: ["preseeds/*"], placeholder: "__TESTING__", value: testing }
  );

  if (options.logo) {
    const logo = await guardPath(options.logo, "file");
    await copyFileStream(logo, path.join(options.stagingDir, LOGO_INITRD_PATH));
    edits.push({ type: "initrd", archive: initrdPathFor(arch), baseDir: options.stagingDir, files: [LOGO_INITRD_PATH] });
  }
  return edits;
}
