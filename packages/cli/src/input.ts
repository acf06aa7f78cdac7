/**
 * Reading step lists from JSON files.
 *
 * A file holds either a generation request (`steps`, optional `variables`
 * and `options`) or a session as the service returns or stores it
 * (`events`). Sessions carry no options of their own.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import {
  formatIssues,
  generationOptionsSchema,
  recordedEventSchema,
  variableSchema,
  type GenerationOptions,
  type RecordedEvent,
  type Variable,
} from "@testcast/core";

export interface StepsInput {
  steps: RecordedEvent[];
  variables: Variable[];
  options: Partial<GenerationOptions>;
}

const requestFileSchema = z.object({
  steps: z.array(recordedEventSchema),
  variables: z.array(variableSchema).default([]),
  options: generationOptionsSchema.partial().default({}),
});

const sessionFileSchema = z.object({
  events: z.array(recordedEventSchema),
});

export type ParseInputResult =
  | { ok: true; input: StepsInput }
  | { ok: false; errors: string[] };

export function parseStepsInput(text: string): ParseInputResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, errors: [`Invalid JSON: ${message}`] };
  }

  if (typeof raw === "object" && raw !== null && "steps" in raw) {
    const parsed = requestFileSchema.safeParse(raw);
    return parsed.success
      ? { ok: true, input: parsed.data }
      : { ok: false, errors: formatIssues(parsed.error) };
  }

  const parsed = sessionFileSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, errors: formatIssues(parsed.error) };
  }
  return {
    ok: true,
    input: { steps: parsed.data.events, variables: [], options: {} },
  };
}

export function readStepsFile(path: string): ParseInputResult {
  return parseStepsInput(readFileSync(path, "utf8"));
}

/** Read a step file for a command, exiting with the problems listed */
export function loadStepsOrExit(path: string): StepsInput {
  let parsed: ParseInputResult;
  try {
    parsed = readStepsFile(path);
  } catch (error) {
    console.error(`Failed to read ${path}:`, error);
    process.exit(1);
  }
  if (!parsed.ok) {
    console.error(`Invalid step file: ${path}`);
    for (const issue of parsed.errors) {
      console.error(`  ${issue}`);
    }
    process.exit(1);
  }
  return parsed.input;
}
