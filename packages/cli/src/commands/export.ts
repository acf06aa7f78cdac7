/**
 * Export command - have the service generate test code for a session.
 */

import { writeFileSync } from "node:fs";
import { loadConfig } from "@testcast/core";
import { generationResponseSchema, postJson, serviceUrl } from "../api.js";
import { flagOverrides, type GenerateCommandOptions } from "./generate.js";

export type ExportCommandOptions = GenerateCommandOptions;

/**
 * Generate code from a session's recorded events.
 * Prints to stdout unless --out is given.
 */
export async function exportCommand(
  id: string,
  flags: ExportCommandOptions
): Promise<void> {
  const options = flagOverrides(flags);
  if (typeof options === "string") {
    console.error(options);
    process.exit(1);
  }

  const baseUrl = serviceUrl(loadConfig());

  try {
    const result = await postJson(
      `${baseUrl}/api/recorder/sessions/${encodeURIComponent(id)}/generate`,
      { options },
      generationResponseSchema
    );

    if (flags.out) {
      writeFileSync(flags.out, result.code);
      console.log(`Exported ${result.language}/${result.framework} test to ${flags.out}`);
    } else {
      process.stdout.write(result.code);
    }
  } catch (error) {
    console.error(`Failed to export session ${id}:`, error);
    process.exit(1);
  }
}
