/**
 * Generate command - turn a step file into test code locally.
 */

import { writeFileSync } from "node:fs";
import { generateCode, resolveOptions } from "@testcast/codegen";
import {
  isLanguage,
  loadConfig,
  type GenerationOptions,
} from "@testcast/core";
import { loadStepsOrExit } from "../input.js";

export interface GenerateCommandOptions {
  language?: string;
  framework?: string;
  comments?: boolean;
  imports?: boolean;
  prettify?: boolean;
  out?: string;
}

/**
 * Option flags win over options stored in the file. Commander sets the
 * boolean flags only for their `--no-*` forms.
 */
export function flagOverrides(
  flags: GenerateCommandOptions
): Partial<GenerationOptions> | string {
  const overrides: Partial<GenerationOptions> = {};
  if (flags.language !== undefined) {
    if (!isLanguage(flags.language)) {
      return `Unknown language: ${flags.language}`;
    }
    overrides.language = flags.language;
  }
  if (flags.framework !== undefined) {
    overrides.framework = flags.framework;
  }
  if (flags.comments === false) {
    overrides.includeComments = false;
  }
  if (flags.imports === false) {
    overrides.includeImports = false;
  }
  if (flags.prettify === false) {
    overrides.prettify = false;
  }
  return overrides;
}

/**
 * Layer flag overrides on the file's options. Switching language on the
 * command line drops the file's framework, which belongs to its language.
 */
export function mergeOptions(
  fromFile: Partial<GenerationOptions>,
  overrides: Partial<GenerationOptions>
): Partial<GenerationOptions> {
  const base =
    overrides.language !== undefined && overrides.language !== fromFile.language
      ? { ...fromFile, framework: undefined }
      : fromFile;
  return { ...base, ...overrides };
}

export async function generateCommand(
  file: string,
  flags: GenerateCommandOptions
): Promise<void> {
  const overrides = flagOverrides(flags);
  if (typeof overrides === "string") {
    console.error(overrides);
    process.exit(1);
  }

  const config = loadConfig();
  const { steps, variables, options } = loadStepsOrExit(file);
  const result = generateCode({
    steps,
    variables,
    options: resolveOptions(mergeOptions(options, overrides), {
      language: config.defaultLanguage,
      framework: config.defaultFramework,
    }),
  });

  if (flags.out) {
    writeFileSync(flags.out, result.code);
    console.log(
      `Wrote ${result.language}/${result.framework} test to ${flags.out}`
    );
  } else {
    process.stdout.write(result.code);
  }
}
