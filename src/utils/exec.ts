import { spawn } from "node:child_process";
import { ProcessFailureError } from "./errors.js";
import { silentLogger, type Logger } from "./log.js";

export interface CommandRequest {
  command: string;
  args: string[];
  cwd?: string;
  /** written to the child's stdin, which is then closed */
  input?: string;
}

export interface CommandResult {
  status: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(request: CommandRequest): Promise<CommandResult>;
}

/** Runs the command as a child process and waits for it to exit. No timeout. */
export const spawnRunner: CommandRunner = {
  run(request) {
    return new Promise((resolve, reject) => {
      const child = spawn(request.command, request.args, { cwd: request.cwd });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout.on("data", (data: Buffer) => stdout.push(data));
      child.stderr.on("data", (data: Buffer) => stderr.push(data));
      child.on("error", reject);
      child.on("close", (code) => {
        resolve({
          status: code,
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: Buffer.concat(stderr).toString("utf8")
        });
      });

      // cpio may exit before reading stdin; the close handler reports that
      child.stdin.on("error", () => undefined);
      child.stdin.end(request.input ?? "");
    });
  }
};

export interface ToolConfig {
  xorriso: string;
  cpio: string;
  runner: CommandRunner;
  logger: Logger;
}

export function resolveTools(overrides: Partial<ToolConfig> = {}, env: NodeJS.ProcessEnv = process.env): ToolConfig {
  return {
    xorriso: overrides.xorriso ?? env.ISOINJECT_XORRISO ?? "xorriso",
    cpio: overrides.cpio ?? env.ISOINJECT_CPIO ?? "cpio",
    runner: overrides.runner ?? spawnRunner,
    logger: overrides.logger ?? silentLogger
  };
}

/**
 * Runs an external tool once. A non-zero exit, a signal or a failure to start
 * the process becomes a ProcessFailureError naming `subject`.
 */
export async function runTool(
  tools: ToolConfig,
  request: CommandRequest,
  failureMessage: string,
  subject: string
): Promise<CommandResult> {
  tools.logger.debug(`Running: ${request.command} ${request.args.join(" ")}`);
  let result: CommandResult;
  try {
    result = await tools.runner.run(request);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ProcessFailureError(failureMessage, subject, request.command, request.args, null, reason);
  }
  if (result.status !== 0) {
    throw new ProcessFailureError(failureMessage, subject, request.command, request.args, result.status, result.stderr);
  }
  return result;
}
