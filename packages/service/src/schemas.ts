/**
 * Request body and query schemas for the HTTP routes.
 */

import { z } from "zod";
import {
  RECORDER_ACTIONS,
  generationOptionsSchema,
  recordedEventSchema,
  variableSchema,
} from "@testcast/core";

export const createSessionBodySchema = z.object({
  name: z.string().min(1),
  projectId: z.string().nullish(),
  description: z.string().nullish(),
  browser: z.string().nullish(),
  framework: z.string().nullish(),
  baseUrl: z.string().url().nullish(),
  maxEventCount: z.number().int().positive().optional(),
});

export const sessionListQuerySchema = z.object({
  status: z.enum(["ACTIVE", "PAUSED", "COMPLETED", "FAILED"]).optional(),
});

export const commandBodySchema = z.object({
  action: z.enum(RECORDER_ACTIONS),
});

const partialOptionsSchema = generationOptionsSchema.partial().default({});

export const generateBodySchema = z.object({
  steps: z.array(recordedEventSchema),
  variables: z.array(variableSchema).default([]),
  options: partialOptionsSchema,
});

export const sessionGenerateBodySchema = z
  .object({
    variables: z.array(variableSchema).default([]),
    options: partialOptionsSchema,
  })
  .default({});
