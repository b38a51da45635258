export type ImageErrorCode =
  | "NotFound"
  | "NotADirectory"
  | "AlreadyExists"
  | "InvalidFormat"
  | "InvalidArgument"
  | "ProcessFailure";

export class ImageError extends Error {
  readonly code: ImageErrorCode;
  readonly path?: string;

  constructor(code: ImageErrorCode, message: string, path?: string) {
    super(message);
    this.name = "ImageError";
    this.code = code;
    this.path = path;
  }
}

function describeFailure(message: string, command: string, status: number | null, stderr: string): string {
  const outcome = status === null ? "did not exit normally" : `exited with ${status}`;
  return `${message}\n${command} ${outcome}${stderr ? `: ${stderr.trim()}` : ""}`;
}

export class ProcessFailureError extends ImageError {
  readonly command: string;
  readonly args: string[];
  readonly status: number | null;
  readonly stderr: string;

  constructor(message: string, path: string, command: string, args: string[], status: number | null, stderr: string) {
    super("ProcessFailure", describeFailure(message, command, status, stderr), path);
    this.name = "ProcessFailureError";
    this.command = command;
    this.args = args;
    this.status = status;
    this.stderr = stderr;
  }
}

export function isImageError(err: unknown, code?: ImageErrorCode): err is ImageError {
  return err instanceof ImageError && (code === undefined || err.code === code);
}
