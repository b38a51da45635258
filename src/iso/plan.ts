import { ImageError } from "../utils/errors.js";
import { detectDebianRelease, initrdPathFor, planDebianEdits } from "./debian.js";
import type { TreeEdit } from "./edits.js";
import type { EditPlan } from "./inject.js";

export interface PlanOptions {
  /** source image path, used to detect the Debian release */
  image: string;
  debian?: boolean;
  arch?: string;
  overlay?: string;
  logo?: string;
  /** archive path inside the tree; defaults to install.<arch>/gtk/initrd.gz */
  initrdArchive?: string;
  initrdBase?: string;
  initrdFiles?: string[];
}

/** Turns command-line style choices into the edit plan for one run. */
export function createEditPlan(options: PlanOptions): EditPlan {
  const initrdFiles = options.initrdFiles ?? [];
  if (initrdFiles.length > 0 && !options.initrdBase) {
    throw new ImageError("InvalidArgument", "Files to append to the initrd need a base directory");
  }
  if (initrdFiles.length > 0 && !options.initrdArchive && !options.arch && !options.debian) {
    throw new ImageError("InvalidArgument", "Files to append to the initrd need an architecture or an archive path");
  }
  if (options.logo && !options.debian) {
    throw new ImageError("InvalidArgument", "A logo can only be injected into Debian images");
  }

  return async ({ stagingDir }) => {
    let edits: TreeEdit[] = [];
    let arch = options.arch;
    if (options.debian) {
      const release = detectDebianRelease(options.image);
      if (arch) {
        release.arch = arch;
      }
      arch = release.arch;
      edits = await planDebianEdits({ release, overlay: options.overlay, logo: options.logo, stagingDir });
    } else if (options.overlay) {
      edits.push({ type: "copy", source: options.overlay });
    }

    if (initrdFiles.length > 0 && options.initrdBase) {
      const archive = options.initrdArchive ?? (arch ? initrdPathFor(arch) : undefined);
      if (!archive) {
        throw new ImageError("InvalidArgument", "No initrd archive path could be determined");
      }
      edits.push({ type: "initrd", archive, baseDir: options.initrdBase, files: initrdFiles });
    }
    return edits;
  };
}
