import type { GenerationOptions, Language } from "@testcast/core";
import { frameworksFor } from "./frameworks/index.js";

export interface OptionDefaults {
  language: Language;
  framework: string;
}

/**
 * Fill in generation options a caller left out. Comments, imports and
 * prettify default to on. A language other than the default, given
 * without a framework, gets that language's first framework.
 */
export function resolveOptions(
  partial: Partial<GenerationOptions>,
  defaults: OptionDefaults
): GenerationOptions {
  const language = partial.language ?? defaults.language;
  const framework =
    partial.framework ??
    (language === defaults.language
      ? defaults.framework
      : (frameworksFor(language)[0] ?? defaults.framework));

  return {
    language,
    framework,
    includeComments: partial.includeComments ?? true,
    includeImports: partial.includeImports ?? true,
    prettify: partial.prettify ?? true,
  };
}
