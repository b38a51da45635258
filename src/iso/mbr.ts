import fs from "node:fs/promises";
import { ImageError } from "../utils/errors.js";
import { guardPath, isImagePath } from "../utils/paths.js";

/**
 * Boot code plus partition-table prefix of a hybrid image, without the
 * trailing signature bytes. Fixed by the isohybrid layout.
 */
export const MBR_SIZE = 432;

async function readPrefix(filePath: string, length: number): Promise<Buffer> {
  const buffer = Buffer.alloc(length);
  const handle = await fs.open(filePath, "r");
  try {
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/** Reads the first MBR_SIZE bytes of an image into a new file. */
export async function extractMbr(sourceImage: string, outputFile: string): Promise<string> {
  const output = await guardPath(outputFile, "absent");
  await guardPath(output, "parentDirectory");
  const source = await guardPath(sourceImage, "file");
  if (!isImagePath(source)) {
    throw new ImageError("InvalidFormat", `Input file is not an image file: ${source}`, source);
  }

  const mbr = await readPrefix(source, MBR_SIZE);
  if (mbr.length !== MBR_SIZE) {
    throw new ImageError("InvalidFormat", `Image is shorter than ${MBR_SIZE} bytes: ${source}`, source);
  }

  // wx: never replace a file that appeared after the guard ran
  await fs.writeFile(output, mbr, { flag: "wx" });
  return output;
}
