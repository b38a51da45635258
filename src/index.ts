export { ImageError, ProcessFailureError, isImageError, type ImageErrorCode } from "./utils/errors.js";
export { resolveTools, spawnRunner, type CommandRequest, type CommandResult, type CommandRunner, type ToolConfig } from "./utils/exec.js";
export { createConsoleLogger, silentLogger, type Logger } from "./utils/log.js";
export { guardPath, expandHome, type PathKind } from "./utils/paths.js";
export { createZipFromDir, extractZip } from "./utils/zip.js";
export { extractIso } from "./iso/extract.js";
export { MBR_SIZE, extractMbr } from "./iso/mbr.js";
export { INITRD_NAME, appendFilesToInitrd, appendToInitrd, type InitrdAppendOptions } from "./iso/initrd.js";
export { MANIFEST_NAME, formatMd5sums, parseMd5sums, regenerateMd5sums, verifyMd5sums, type Md5sumEntry, type Md5sumsOptions, type Md5sumsReport } from "./iso/md5sums.js";
export { buildMkisofsArgs, repackIso, validateVolumeName } from "./iso/repack.js";
export { applyEdit, applyEdits, type EditContext, type TreeEdit } from "./iso/edits.js";
export { detectDebianRelease, initrdPathFor, planDebianEdits, type DebianRelease } from "./iso/debian.js";
export { DEFAULT_VOLUME_NAME, injectIntoIso, type EditPlan, type InjectOptions, type InjectResult } from "./iso/inject.js";
export { createEditPlan, type PlanOptions } from "./iso/plan.js";
