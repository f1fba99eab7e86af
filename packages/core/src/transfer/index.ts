export {
  createProcessRunner,
  combinedOutput,
  failureReason,
  isFailedResult,
  runLogged,
  type CommandResult,
  type CommandRunner,
} from "./runner.js";
export { invoke, type TransferContext } from "./context.js";
export { withFileList, withScratchDir, moveFile, pathExists } from "./scratch.js";
export { listEntries, querySize, querySizes, UNKNOWN_SIZE } from "./list.js";
export {
  putFile,
  deriveStagingPrefix,
  SAGA_STEPS,
  type PutFileOptions,
  type SagaStepName,
  type SagaStepResult,
  type UploadReport,
} from "./upload.js";
export { getFile, type GetFileOptions } from "./fetch.js";
export { deleteFiles, type DeleteOutcome } from "./delete.js";
