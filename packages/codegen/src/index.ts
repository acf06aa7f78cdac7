export { generateCode, usesRegex } from "./generator.js";
export { commandFor } from "./commands.js";
export { conditionExpression } from "./conditions.js";
export { findProfile, frameworksFor, scaffoldProfile } from "./frameworks/index.js";
export { languageSyntax } from "./languages/index.js";
export { CodeWriter, prettify } from "./writer.js";
export { resolveOptions } from "./options.js";
export type { OptionDefaults } from "./options.js";
export type {
  FrameworkProfile,
  PageQueries,
  RenderContext,
  RenderFn,
  RendererTable,
  Target,
  AssertionSubject,
} from "./context.js";
export type { LanguageSyntax, ValueOps, Wrapper } from "./languages/index.js";
