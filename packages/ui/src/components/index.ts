export { default as AddKeyForm } from "./AddKeyForm";
export { default as CompletionBar } from "./CompletionBar";
export { default as ConfirmDialog } from "./ConfirmDialog";
export { default as DashboardScreen } from "./DashboardScreen";
export { default as EditorScreen } from "./EditorScreen";
export { default as ProjectSettingsScreen } from "./ProjectSettingsScreen";
export { default as RenameInlineForm } from "./RenameInlineForm";
export { default as StatusBar } from "./StatusBar";
export { default as TranslationTable } from "./TranslationTable";
export { default as UploadScreen } from "./UploadScreen";
