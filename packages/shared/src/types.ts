export type TranslationTree = Record<string, unknown>;

export type TranslationsByLocale = Record<string, TranslationTree>;

export type FlatTranslations = Record<string, string>;

export type AppProject = {
  id: string;
  name: string;
  sourceLanguage: string;
  targetLanguages: string[];
  createdAt: string;
  updatedAt: string;
};

export type ProjectInput = {
  name: string;
  sourceLanguage: string;
  targetLanguages: string[];
};

export type TranslationRow = {
  key: string;
  values: Record<string, string>;
};

export type LanguageCompletion = {
  language: string;
  filled: number;
  total: number;
  percent: number;
};

export type ProjectSummary = AppProject & {
  keyCount: number;
  completion: LanguageCompletion[];
};

export type TranslationChange = {
  key: string;
  language: string;
  value: string;
};

export type UploadMode = "replace" | "merge";

export type ExportConfig = {
  sortKeys: boolean;
  omitEmpty: boolean;
  indent: number;
};

export type LingoDeskConfig = {
  dataDir: string;
  port: number;
  defaultSourceLanguage: string;
  uploadLimit: string;
  export: ExportConfig;
};

export type PublicConfig = Pick<LingoDeskConfig, "defaultSourceLanguage" | "export">;

export type TableResponse = {
  languages: string[];
  rows: TranslationRow[];
  completion: LanguageCompletion[];
  total: number;
  missing: number;
};
