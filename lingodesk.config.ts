import type { LingoDeskConfigInput } from "./packages/cli/src/config";

export default {
  dataDir: ".lingodesk",
  port: 5280,
  defaultSourceLanguage: "en",
  uploadLimit: "5mb",
  export: {
    sortKeys: true,
    omitEmpty: false,
    indent: 2,
  },
} satisfies LingoDeskConfigInput;
