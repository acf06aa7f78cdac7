import type { Language } from "@testcast/core";
import { csharpSyntax } from "./csharp.js";
import { javaSyntax } from "./java.js";
import { javascriptSyntax } from "./javascript.js";
import { pythonSyntax } from "./python.js";
import type { LanguageSyntax } from "./types.js";

const SYNTAXES: Record<Language, LanguageSyntax> = {
  java: javaSyntax,
  javascript: javascriptSyntax,
  python: pythonSyntax,
  csharp: csharpSyntax,
};

export function languageSyntax(language: Language): LanguageSyntax {
  return SYNTAXES[language];
}

export { javaSyntax, javascriptSyntax, pythonSyntax, csharpSyntax };
export type {
  LanguageSyntax,
  ValueOps,
  Wrapper,
  BlockShape,
  BlockSegment,
  BlockContext,
  CompareOperator,
} from "./types.js";
