import path from "node:path";
import fs from "node:fs/promises";
import { createWriteStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import type { Readable } from "node:stream";
import * as yauzl from "yauzl";
import * as yazl from "yazl";
import { ImageError } from "./errors.js";
import { ensureDir, listFiles } from "./fs.js";
import { safeJoin } from "./paths.js";

const FIXED_ZIP_MTIME = new Date("2000-01-01T00:00:00Z");

/** Unpacks an overlay bundle into `outDir` and returns the files written. */
export async function extractZip(zipPath: string, outDir: string): Promise<string[]> {
  await ensureDir(outDir);
  const written: string[] = [];
  return new Promise((resolve, reject) => {
    yauzl.open(zipPath, { lazyEntries: true }, (openErr, zipfile) => {
      if (openErr || !zipfile) {
        reject(new ImageError("InvalidFormat", `Unable to open overlay bundle: ${zipPath}`, zipPath));
        return;
      }

      const onError = (err: unknown) => {
        zipfile.close();
        reject(err);
      };

      const writeEntry = async (entry: yauzl.Entry): Promise<void> => {
        const entryName = entry.fileName;
        if (entryName.endsWith("/")) {
          await ensureDir(safeJoin(outDir, entryName.slice(0, -1)));
          return;
        }
        const destPath = safeJoin(outDir, entryName);
        await ensureDir(path.dirname(destPath));
        const readStream = await new Promise<Readable>((res, rej) => {
          zipfile.openReadStream(entry, (streamErr, stream) => {
            if (streamErr || !stream) {
              rej(streamErr ?? new ImageError("InvalidFormat", `Unable to read bundle entry ${entryName}`, zipPath));
              return;
            }
            res(stream);
          });
        });
        await pipeline(readStream, createWriteStream(destPath));
        written.push(entryName);
      };

      zipfile.readEntry();
      zipfile.on("entry", (entry: yauzl.Entry) => {
        writeEntry(entry)
          .then(() => zipfile.readEntry())
          .catch(onError);
      });
      zipfile.on("end", () => zipfile.close());
      zipfile.on("close", () => resolve(written.sort()));
      zipfile.on("error", onError);
    });
  });
}

/** Packs a directory into a bundle with fixed timestamps, keeping file modes. */
export async function createZipFromDir(sourceDir: string, outZipPath: string): Promise<string[]> {
  await ensureDir(path.dirname(outZipPath));
  const zipfile = new yazl.ZipFile();
  // fails up front if the bundle exists
  const handle = await fs.open(outZipPath, "wx");
  const outputStream = handle.createWriteStream();
  const outputPromise = new Promise<void>((resolve, reject) => {
    outputStream.on("error", reject);
    zipfile.outputStream.pipe(outputStream).on("close", resolve);
  });

  const files = await listFiles(sourceDir);
  for (const relPath of files) {
    const absPath = safeJoin(sourceDir, relPath);
    const stat = await fs.stat(absPath);
    zipfile.addFile(absPath, relPath, { mtime: FIXED_ZIP_MTIME, mode: stat.mode & 0o777 });
  }

  zipfile.end();
  await outputPromise;
  return files;
}
