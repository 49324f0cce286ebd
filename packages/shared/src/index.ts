export type {
  AppProject,
  ExportConfig,
  FlatTranslations,
  LanguageCompletion,
  LingoDeskConfig,
  ProjectInput,
  ProjectSummary,
  PublicConfig,
  TableResponse,
  TranslationChange,
  TranslationRow,
  TranslationTree,
  TranslationsByLocale,
  UploadMode,
} from "./types";
export type { LanguageComparison } from "./languageCodes";
export {
  compareLanguages,
  isKnownLanguage,
  isLanguageCode,
  normalizeLanguageCode,
  parseLanguageList,
  primaryLanguage,
} from "./languageCodes";
export type {
  ProjectField,
  ProjectFieldError,
  ProjectFieldErrorCode,
} from "./projectValidation";
export {
  MAX_PROJECT_NAME_LENGTH,
  normalizeProjectInput,
  projectLanguages,
  validateProjectInput,
} from "./projectValidation";
export type { InvalidKeyReason } from "./translationKeys";
export {
  describeInvalidKeyReason,
  getInvalidTranslationKeyReason,
} from "./translationKeys";
export type {
  RowFilter,
  TranslationTableErrorCode,
  TreeExportOptions,
} from "./translationTable";
export { TranslationTable, TranslationTableError, isFilled } from "./translationTable";
export type {
  FlattenResult,
  TranslationTreeErrorCode,
  UnflattenOptions,
} from "./translationTree";
export {
  TranslationTreeError,
  compareKeys,
  findKeyConflict,
  flattenObject,
  flattenTranslations,
  isDotPrefix,
  unflattenTranslations,
} from "./translationTree";
export type {
  LocaleUpload,
  UploadIssue,
  UploadIssueCode,
  UploadValidation,
} from "./uploadValidation";
export {
  inferLanguageFromFileName,
  isForceableUploadFailure,
  validateLocaleUpload,
} from "./uploadValidation";
