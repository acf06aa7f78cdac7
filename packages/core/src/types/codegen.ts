/**
 * Code generation request and result types.
 */

import type { RecordedEvent } from "./events.js";

export type Language = "java" | "javascript" | "python" | "csharp";

export const LANGUAGES: readonly Language[] = [
  "java",
  "javascript",
  "python",
  "csharp",
];

export type VariableType = "STRING" | "NUMBER" | "BOOLEAN" | "OBJECT" | "ARRAY";

/** A test variable declared ahead of the steps */
export interface Variable {
  name: string;
  type: VariableType;

  /** Literal text; OBJECT and ARRAY values are JSON */
  value: string;
}

export interface GenerationOptions {
  language: Language;
  framework: string;
  includeComments: boolean;
  includeImports: boolean;
  prettify: boolean;
}

export interface GenerationRequest {
  steps: RecordedEvent[];
  variables: Variable[];
  options: GenerationOptions;
}

export interface GenerationResult {
  code: string;

  /** Extension including the dot, e.g. ".py" */
  fileExtension: string;

  language: Language;
  framework: string;
}

export function isLanguage(value: string): value is Language {
  return LANGUAGES.some((language) => language === value);
}
