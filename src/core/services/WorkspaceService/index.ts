export {
  WorkspaceServiceTag,
  WorkspaceServiceLive,
  WorkspaceNotFound,
  WorkspacePermissionDenied,
  WorkspaceFailed,
  NoDirectoriesFound,
  SCRATCH_PREFIX,
} from "./WorkspaceService"
export type { WorkspaceService, WorkspaceError } from "./WorkspaceService"
