/**
 * Zod schemas for everything that crosses a process boundary:
 * recorded events, generation requests and session snapshots.
 */

import { z } from "zod";
import type {
  ConditionConfig,
  ElementInfo,
  GenerationRequest,
  Operand,
  RecordedEvent,
  SessionSnapshot,
} from "../types/index.js";
import { IDENTIFIER_PATTERN } from "../ir/validate.js";

// Unknown strategies render as XPath
export const locatorSchema = z.object({
  strategy: z
    .enum([
      "CSS",
      "XPATH",
      "ID",
      "NAME",
      "TAG",
      "CLASS",
      "LINK_TEXT",
      "PARTIAL_LINK_TEXT",
      "ACCESSIBILITY_ID",
    ])
    .catch("XPATH"),
  value: z.string(),
});

export const elementInfoSchema: z.ZodType<ElementInfo, z.ZodTypeDef, unknown> =
  z.object({
    tagName: z.string(),
    id: z.string().optional(),
    className: z.string().optional(),
    name: z.string().optional(),
    type: z.string().optional(),
    value: z.string().optional(),
    text: z.string().optional(),
    cssSelector: z.string().optional(),
    xpath: z.string().optional(),
    selector: z.string().optional(),
    href: z.string().optional(),
    src: z.string().optional(),
    alt: z.string().optional(),
    placeholder: z.string().optional(),
    attributes: z.record(z.string()).optional(),
    boundingRect: z
      .object({
        x: z.number(),
        y: z.number(),
        width: z.number(),
        height: z.number(),
      })
      .optional(),
    visible: z.boolean().optional(),
    enabled: z.boolean().optional(),
    selected: z.boolean().optional(),
    locator: locatorSchema.optional(),
  });

const operandSchema: z.ZodType<Operand, z.ZodTypeDef, unknown> =
  z.discriminatedUnion("type", [
    z.object({ type: z.literal("LITERAL"), value: z.string() }),
    z.object({ type: z.literal("VARIABLE"), variableName: z.string() }),
    z.object({
      type: z.literal("ELEMENT"),
      element: elementInfoSchema.optional(),
      property: z.string().optional(),
    }),
  ]);

export const conditionSchema: z.ZodType<
  ConditionConfig,
  z.ZodTypeDef,
  unknown
> = z.object({
  operator: z.enum([
    "EQUALS",
    "NOT_EQUALS",
    "GREATER_THAN",
    "LESS_THAN",
    "GREATER_THAN_OR_EQUALS",
    "LESS_THAN_OR_EQUALS",
    "CONTAINS",
    "NOT_CONTAINS",
    "STARTS_WITH",
    "ENDS_WITH",
    "MATCHES",
    "IS_TRUE",
    "IS_FALSE",
  ]),
  left: operandSchema.optional(),
  right: operandSchema.optional(),
  negated: z.boolean().optional(),
  expression: z.string().optional(),
});

const baseFields = {
  id: z.string().min(1),
  timestamp: z.number(),
  url: z.string(),
  title: z.string().optional(),
  description: z.string().optional(),
  disabled: z.boolean().optional(),
};

const childList = z.lazy(() => z.array(recordedEventSchema));

const clickSchema = z.object({
  ...baseFields,
  type: z.literal("CLICK"),
  element: elementInfoSchema.optional(),
  button: z.enum(["LEFT", "MIDDLE", "RIGHT"]).optional(),
  doubleClick: z.boolean().optional(),
  ctrlKey: z.boolean().optional(),
  shiftKey: z.boolean().optional(),
  altKey: z.boolean().optional(),
  metaKey: z.boolean().optional(),
});

const inputSchema = z.object({
  ...baseFields,
  type: z.literal("INPUT"),
  element: elementInfoSchema.optional(),
  value: z.string().optional(),
  previousValue: z.string().optional(),
  inputType: z
    .enum([
      "TEXT",
      "SELECT",
      "CHECKBOX",
      "RADIO",
      "FILE",
      "DATE",
      "COLOR",
      "RANGE",
      "CONTENTEDITABLE",
    ])
    .optional(),
  clearFirst: z.boolean().optional(),
  passwordField: z.boolean().optional(),
  masked: z.boolean().optional(),
  selectedFiles: z.array(z.string()).optional(),
});

const navigationSchema = z.object({
  ...baseFields,
  type: z.literal("NAVIGATION"),
  sourceUrl: z.string().optional(),
  targetUrl: z.string(),
  trigger: z
    .enum([
      "LINK_CLICK",
      "FORM_SUBMISSION",
      "SCRIPT",
      "USER_INITIATED",
      "REDIRECT",
      "RELOAD",
      "BACK_BUTTON",
      "FORWARD_BUTTON",
      "ADDRESS_BAR",
      "HISTORY_API",
      "OTHER",
    ])
    .optional(),
  back: z.boolean().optional(),
  forward: z.boolean().optional(),
  refresh: z.boolean().optional(),
  redirect: z.boolean().optional(),
  loadTimeMs: z.number().optional(),
});

const assertionSchema = z.object({
  ...baseFields,
  type: z.literal("ASSERTION"),
  assertionType: z.enum([
    "PRESENT",
    "VISIBLE",
    "ENABLED",
    "SELECTED",
    "TEXT_EQUALS",
    "TEXT_CONTAINS",
    "ATTRIBUTE_EQUALS",
    "ATTRIBUTE_CONTAINS",
    "URL",
    "URL_CONTAINS",
    "TITLE",
    "TITLE_CONTAINS",
    "EQUALS",
    "CONTAINS",
    "STARTS_WITH",
    "ENDS_WITH",
    "REGEX_MATCH",
    "GREATER_THAN",
    "LESS_THAN",
    "GREATER_THAN_OR_EQUALS",
    "LESS_THAN_OR_EQUALS",
    "COUNT_EQUALS",
    "COUNT_GREATER_THAN",
    "COUNT_LESS_THAN",
    "CUSTOM_JAVASCRIPT",
  ]),
  element: elementInfoSchema.optional(),
  expectedValue: z.string().nullable().optional(),
  attributeName: z.string().optional(),
  negated: z.boolean().optional(),
  soft: z.boolean().optional(),
  caseSensitive: z.boolean().optional(),
  numeric: z.boolean().optional(),
  tolerance: z.number().optional(),
  customMessage: z.string().optional(),
  script: z.string().optional(),
  status: z.enum(["NOT_EXECUTED", "PASSED", "FAILED", "ERROR"]).optional(),
  actualValue: z.string().nullable().optional(),
});

const captureSchema = z.object({
  ...baseFields,
  type: z.literal("CAPTURE"),
  capture: z.object({
    variableName: z.string(),
    source: z.enum([
      "ELEMENT",
      "RESPONSE",
      "JAVASCRIPT",
      "URL",
      "COOKIE",
      "STORAGE",
    ]),
    method: z.enum([
      "PROPERTY",
      "ATTRIBUTE",
      "INNER_TEXT",
      "INNER_HTML",
      "TEXT_CONTENT",
      "JSON_PATH",
      "XPATH",
      "REGEX",
      "JAVASCRIPT",
    ]),
    element: elementInfoSchema.optional(),
    selector: z.string().optional(),
    property: z.string().optional(),
    expression: z.string().optional(),
    defaultValue: z.string().optional(),
    global: z.boolean().optional(),
  }),
});

const customJsSchema = z.object({
  ...baseFields,
  type: z.literal("CUSTOM_JS"),
  script: z.string(),
  async: z.boolean().optional(),
  timeoutMs: z.number().optional(),
  returnVariables: z.array(z.string()).optional(),
  useElementContext: z.boolean().optional(),
  contextElement: elementInfoSchema.optional(),
});

const groupSchema = z.object({
  ...baseFields,
  type: z.literal("GROUP"),
  name: z.string(),
  events: childList,
  collapsed: z.boolean().optional(),
  color: z.string().optional(),
});

const loopSchema = z.object({
  ...baseFields,
  type: z.literal("LOOP"),
  loop: z.object({
    loopType: z.enum(["COUNT", "WHILE", "UNTIL", "FOR_EACH"]),
    iterationVariable: z.string(),
    count: z.number().int().optional(),
    condition: conditionSchema.optional(),
    dataSourceId: z.string().optional(),
    dataSourcePath: z.string().optional(),
    maxIterations: z.number().int().optional(),
  }),
  events: childList,
});

const conditionalSchema = z.object({
  ...baseFields,
  type: z.literal("CONDITIONAL"),
  condition: conditionSchema.optional(),
  thenEvents: childList,
  elseEvents: childList,
});

const tryCatchSchema = z.object({
  ...baseFields,
  type: z.literal("TRY_CATCH"),
  tryEvents: childList,
  catchEvents: childList,
  finallyEvents: childList,
  errorVariable: z.string(),
  catchErrorTypes: z.array(z.string()).optional(),
  continueOnError: z.boolean().optional(),
  logError: z.boolean().optional(),
});

export const recordedEventSchema: z.ZodType<
  RecordedEvent,
  z.ZodTypeDef,
  unknown
> = z.discriminatedUnion("type", [
  clickSchema,
  inputSchema,
  navigationSchema,
  assertionSchema,
  captureSchema,
  customJsSchema,
  groupSchema,
  loopSchema,
  conditionalSchema,
  tryCatchSchema,
]);

export const variableSchema = z.object({
  name: z.string().regex(IDENTIFIER_PATTERN, "Variable name must be a valid identifier"),
  type: z.enum(["STRING", "NUMBER", "BOOLEAN", "OBJECT", "ARRAY"]),
  value: z.string(),
});

export const generationOptionsSchema = z.object({
  language: z.enum(["java", "javascript", "python", "csharp"]),
  framework: z.string().min(1),
  includeComments: z.boolean(),
  includeImports: z.boolean(),
  prettify: z.boolean(),
});

export const generationRequestSchema: z.ZodType<
  GenerationRequest,
  z.ZodTypeDef,
  unknown
> = z.object({
  steps: z.array(recordedEventSchema),
  variables: z.array(variableSchema),
  options: generationOptionsSchema,
});

export const agentInfoSchema = z.object({
  userAgent: z.string(),
  platform: z.string().optional(),
  language: z.string().optional(),
  viewport: z.object({ width: z.number(), height: z.number() }).optional(),
  initialUrl: z.string().optional(),
  transport: z.enum(["websocket", "http"]),
  connectedAt: z.string(),
});

export const sessionSnapshotSchema: z.ZodType<
  SessionSnapshot,
  z.ZodTypeDef,
  unknown
> = z.object({
  id: z.string(),
  name: z.string(),
  projectId: z.string().nullable(),
  description: z.string().nullable(),
  browser: z.string().nullable(),
  framework: z.string().nullable(),
  baseUrl: z.string().nullable(),
  status: z.enum(["ACTIVE", "PAUSED", "COMPLETED", "FAILED"]),
  startTime: z.string(),
  endTime: z.string().nullable(),
  sessionKey: z.string(),
  admission: z.object({ maxEventCount: z.number().int().nonnegative() }),
  agent: agentInfoSchema.nullable(),
  agentErrors: z.array(
    z.object({
      message: z.string(),
      context: z.string().optional(),
      timestamp: z.number(),
    })
  ),
  events: z.array(recordedEventSchema),
});

/** Flatten zod issues into "path: message" lines for error replies */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join(".")}: ${issue.message}`
      : issue.message
  );
}
