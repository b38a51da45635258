#!/usr/bin/env node
import { Command } from "commander";
import { appendToInitrd } from "./iso/initrd.js";
import { extractIso } from "./iso/extract.js";
import { extractMbr } from "./iso/mbr.js";
import { regenerateMd5sums, verifyMd5sums } from "./iso/md5sums.js";
import { repackIso } from "./iso/repack.js";
import { DEFAULT_VOLUME_NAME, injectIntoIso } from "./iso/inject.js";
import { createEditPlan } from "./iso/plan.js";
import { resolveTools } from "./utils/exec.js";
import { createConsoleLogger, silentLogger } from "./utils/log.js";
import { guardPath } from "./utils/paths.js";
import { createZipFromDir } from "./utils/zip.js";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function fail(err: unknown): void {
  console.error(err instanceof Error ? err.message : err);
  process.exitCode = 1;
}

const program = new Command();

program
  .name("isoinject")
  .description("Inject files into the initrd of hybrid bootable installer images and repack them.")
  .version("0.1.0")
  .option("--verbose", "Print external commands as they run");

function tools(quiet = false) {
  const logger = quiet ? silentLogger : createConsoleLogger({ verbose: program.opts<{ verbose?: boolean }>().verbose });
  return resolveTools({ logger });
}

program
  .command("inject")
  .description("Extract an image, inject files, regenerate md5sum.txt and repack it.")
  .requiredOption("--in <image>", "Source .iso or .img image")
  .requiredOption("--out <image>", "Output image (must not exist)")
  .option("--volume-name <name>", "Filesystem name of the new image", DEFAULT_VOLUME_NAME)
  .option("--overlay <dir|zip>", "Directory or bundle copied over the image root")
  .option("--initrd-base <dir>", "Base directory of the files appended to the initrd")
  .option("--initrd-file <path>", "File relative to --initrd-base to append (repeatable)", collect, [])
  .option("--initrd-archive <path>", "initrd.gz path inside the image")
  .option("--arch <token>", "Architecture token of the install.<arch> directory")
  .option("--debian", "Apply the Debian installer edits")
  .option("--logo <png>", "Installer logo put into the initrd (with --debian)")
  .option("--absolute-initrd-paths", "Hand absolute file paths to cpio")
  .option("--walk-order", "Keep directory walk order in md5sum.txt")
  .option("--quiet", "Print nothing but errors")
  .action(
    async (opts: {
      in: string;
      out: string;
      volumeName: string;
      overlay?: string;
      initrdBase?: string;
      initrdFile: string[];
      initrdArchive?: string;
      arch?: string;
      debian?: boolean;
      logo?: string;
      absoluteInitrdPaths?: boolean;
      walkOrder?: boolean;
      quiet?: boolean;
    }) => {
      try {
        const edits = createEditPlan({
          image: opts.in,
          debian: opts.debian,
          arch: opts.arch,
          overlay: opts.overlay,
          logo: opts.logo,
          initrdArchive: opts.initrdArchive,
          initrdBase: opts.initrdBase,
          initrdFiles: opts.initrdFile
        });
        await injectIntoIso({
          input: opts.in,
          output: opts.out,
          volumeName: opts.volumeName,
          edits,
          initrdInputPath: opts.absoluteInitrdPaths ? "absolute" : "relative",
          manifestOrder: opts.walkOrder ? "walk" : "sorted",
          tools: tools(opts.quiet)
        });
      } catch (err) {
        fail(err);
      }
    }
  );

program
  .command("extract")
  .description("Extract the full tree of an image into an existing directory.")
  .requiredOption("--in <image>", "Source image")
  .requiredOption("--out <dir>", "Existing output directory")
  .action(async (opts: { in: string; out: string }) => {
    try {
      await extractIso(opts.in, opts.out, tools());
      console.log(`Extracted ${opts.in} to ${opts.out}`);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("extract-mbr")
  .description("Write the first 432 bytes of an image to a new file.")
  .requiredOption("--in <image>", "Source .iso or .img image")
  .requiredOption("--out <file>", "Output file (must not exist)")
  .action(async (opts: { in: string; out: string }) => {
    try {
      const output = await extractMbr(opts.in, opts.out);
      console.log(`MBR written to ${output}`);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("append-initrd")
  .description("Append one file to an initrd.gz archive.")
  .requiredOption("--archive <initrd.gz>", "Archive to patch")
  .requiredOption("--base <dir>", "Directory the file path is relative to")
  .requiredOption("--file <path>", "File path relative to --base")
  .option("--absolute", "Hand the absolute file path to cpio")
  .action(async (opts: { archive: string; base: string; file: string; absolute?: boolean }) => {
    try {
      await appendToInitrd(opts.archive, opts.base, opts.file, {
        inputPath: opts.absolute ? "absolute" : "relative",
        tools: tools()
      });
      console.log(`Appended ${opts.file} to ${opts.archive}`);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("md5sums")
  .description("Regenerate or verify md5sum.txt of an extracted image.")
  .requiredOption("--root <dir>", "Extracted image root")
  .option("--verify", "Check the existing manifest instead of rewriting it")
  .option("--walk-order", "Keep directory walk order")
  .action(async (opts: { root: string; verify?: boolean; walkOrder?: boolean }) => {
    try {
      if (opts.verify) {
        const report = await verifyMd5sums(opts.root);
        for (const relPath of report.missing) console.error(`missing: ${relPath}`);
        for (const relPath of report.mismatched) console.error(`mismatch: ${relPath}`);
        if (report.missing.length > 0 || report.mismatched.length > 0) {
          process.exitCode = 1;
          return;
        }
        console.log(`Verified ${report.checked} checksum(s).`);
        return;
      }
      const entries = await regenerateMd5sums(opts.root, { order: opts.walkOrder ? "walk" : "sorted" });
      console.log(`Wrote ${entries.length} checksum(s).`);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("repack")
  .description("Build a hybrid bootable image from a tree and an MBR file.")
  .requiredOption("--mbr <file>", "MBR extracted from the source image")
  .requiredOption("--root <dir>", "Tree to pack")
  .requiredOption("--out <image>", "Output image (must not exist)")
  .option("--volume-name <name>", "Filesystem name", DEFAULT_VOLUME_NAME)
  .action(async (opts: { mbr: string; root: string; out: string; volumeName: string }) => {
    try {
      const output = await repackIso(opts.out, opts.mbr, opts.root, opts.volumeName, tools());
      console.log(`Image written to ${output}`);
    } catch (err) {
      fail(err);
    }
  });

program
  .command("bundle")
  .description("Pack an overlay directory into a zip bundle for --overlay.")
  .requiredOption("--dir <dir>", "Overlay directory")
  .requiredOption("--out <bundle.zip>", "Output bundle (must not exist)")
  .action(async (opts: { dir: string; out: string }) => {
    try {
      const dir = await guardPath(opts.dir, "directory");
      const out = await guardPath(opts.out, "absent");
      const files = await createZipFromDir(dir, out);
      console.log(`Bundled ${files.length} file(s) into ${out}`);
    } catch (err) {
      fail(err);
    }
  });

await program.parseAsync(process.argv);
