/**
 * Describe command - print a step file as an indented outline.
 */

import { countEvents } from "@testcast/core";
import { describeTree } from "../format.js";
import { loadStepsOrExit } from "../input.js";

export async function describeCommand(file: string): Promise<void> {
  const { steps } = loadStepsOrExit(file);
  if (steps.length === 0) {
    console.log("No steps.");
    return;
  }
  for (const line of describeTree(steps)) {
    console.log(line);
  }
  console.log("");
  console.log(`${countEvents(steps)} step(s)`);
}
