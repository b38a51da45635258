import { resolveTools, runTool, type ToolConfig } from "../utils/exec.js";
import { guardPath } from "../utils/paths.js";

/**
 * Unpacks the whole tree of an ISO image into an existing directory with
 * xorriso, keeping the permissions recorded in the image. On failure the
 * caller discards `outputDir`.
 */
export async function extractIso(sourceImage: string, outputDir: string, tools: ToolConfig = resolveTools()): Promise<void> {
  const output = await guardPath(outputDir, "directory");
  const source = await guardPath(sourceImage, "file");

  await runTool(
    tools,
    {
      command: tools.xorriso,
      args: ["-osirrox", "on", "-indev", source, "-extract", "/", output]
    },
    `An error occurred while extracting ${source}`,
    source
  );
}
