import path from "node:path";
import fs from "node:fs/promises";
import os from "node:os";
import { resolveTools, type CommandRequest, type CommandResult, type ToolConfig } from "../../src/utils/exec.js";
import { silentLogger } from "../../src/utils/log.js";
import { removeDir } from "../../src/utils/fs.js";

export type FakeHandler = (request: CommandRequest) => Promise<CommandResult>;

export interface FakeTools {
  tools: ToolConfig;
  calls: CommandRequest[];
}

export const OK: CommandResult = { status: 0, stdout: "", stderr: "" };

/** Tool config whose runner dispatches to in-process handlers by command name. */
export function fakeTools(handlers: Partial<Record<"xorriso" | "cpio", FakeHandler>>): FakeTools {
  const calls: CommandRequest[] = [];
  const tools = resolveTools(
    {
      logger: silentLogger,
      runner: {
        async run(request) {
          calls.push(request);
          const handler = request.command === "xorriso" ? handlers.xorriso : request.command === "cpio" ? handlers.cpio : undefined;
          if (!handler) {
            return { status: 127, stdout: "", stderr: `${request.command}: not found` };
          }
          return handler(request);
        }
      }
    },
    {}
  );
  return { tools, calls };
}

export function argAfter(args: string[], flag: string): string {
  const index = args.indexOf(flag);
  if (index === -1 || index + 1 >= args.length) {
    throw new Error(`missing ${flag} in ${args.join(" ")}`);
  }
  return args[index + 1];
}

/** cpio stand-in that appends a marker with the piped file list to the -F archive. */
export const appendingCpio: FakeHandler = async (request) => {
  await fs.appendFile(argAfter(request.args, "-F"), `CPIO:${request.input ?? ""}`);
  return OK;
};

export async function writeFile(filePath: string, content: string | Buffer, mode?: number): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
  if (mode !== undefined) {
    await fs.chmod(filePath, mode);
  }
}

export async function modeOf(filePath: string): Promise<number> {
  return (await fs.stat(filePath)).mode & 0o777;
}

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "isoinject-test-"));
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
