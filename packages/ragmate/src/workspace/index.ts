export { type UploadOutcome, WorkspaceClient, type WorkspaceClientOptions, workspaceName } from "./client.js";
export {
  type ChatResponse,
  chatResponseSchema,
  type WorkspaceInfo,
  workspaceInfoSchema,
  type WorkspaceSource,
  workspaceSourceSchema,
} from "./schemas.js";
export {
  type DocumentUploader,
  normalizeExtensions,
  type UploadDirectoryOptions,
  type UploadSummary,
  uploadDirectory,
  uploadSucceeded,
} from "./upload.js";
