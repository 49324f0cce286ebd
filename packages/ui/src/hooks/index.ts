export { useConfirmDialog } from "./useConfirmDialog";
export type { ConfirmOptions, ConfirmRequest, DialogApi } from "./useConfirmDialog";
export { useProjectEditor } from "./useProjectEditor";
export type { ProjectEditor } from "./useProjectEditor";
export { useProjects } from "./useProjects";
