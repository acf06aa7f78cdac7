/**
 * Event types for testcast.
 * A recording is a tree of events: leaf interactions plus container events
 * that own ordered child lists. Children never point back at their parent.
 */

/** Leaf kinds: single interactions with no nested children */
export type LeafKind =
  | "CLICK"
  | "INPUT"
  | "NAVIGATION"
  | "ASSERTION"
  | "CAPTURE"
  | "CUSTOM_JS";

/** Container kinds: own one or more ordered child-event lists */
export type ContainerKind = "GROUP" | "LOOP" | "CONDITIONAL" | "TRY_CATCH";

/** Discriminant of every recorded event */
export type EventKind = LeafKind | ContainerKind;

export const LEAF_KINDS: readonly LeafKind[] = [
  "CLICK",
  "INPUT",
  "NAVIGATION",
  "ASSERTION",
  "CAPTURE",
  "CUSTOM_JS",
];

export const CONTAINER_KINDS: readonly ContainerKind[] = [
  "GROUP",
  "LOOP",
  "CONDITIONAL",
  "TRY_CATCH",
];

export const EVENT_KINDS: readonly EventKind[] = [
  ...LEAF_KINDS,
  ...CONTAINER_KINDS,
];

/** How a generated script should locate an element */
export type LocatorStrategy =
  | "CSS"
  | "XPATH"
  | "ID"
  | "NAME"
  | "TAG"
  | "CLASS"
  | "LINK_TEXT"
  | "PARTIAL_LINK_TEXT"
  | "ACCESSIBILITY_ID";

export interface Locator {
  strategy: LocatorStrategy;
  value: string;
}

export interface BoundingRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Snapshot of a DOM element taken when the interaction was captured.
 * Every selector field is optional: the agent fills what it can compute.
 */
export interface ElementInfo {
  tagName: string;
  id?: string;
  className?: string;
  name?: string;
  type?: string;
  value?: string;
  text?: string;

  /** CSS selector computed by the agent (unique in the page when possible) */
  cssSelector?: string;

  /** Absolute or id-anchored XPath */
  xpath?: string;

  /** Free-form selector supplied by an editor rather than the agent */
  selector?: string;

  href?: string;
  src?: string;
  alt?: string;
  placeholder?: string;
  attributes?: Record<string, string>;
  boundingRect?: BoundingRect;
  visible?: boolean;
  enabled?: boolean;
  selected?: boolean;

  /** Preferred locator, overrides the derived one during code generation */
  locator?: Locator;
}

/**
 * Fields shared by every event kind.
 */
export interface BaseEvent {
  /** Unique event ID (agent instance prefix + sequence number) */
  id: string;

  /** Type of this event */
  type: EventKind;

  /** When the event was captured (epoch milliseconds) */
  timestamp: number;

  /** Page URL at capture time */
  url: string;

  /** Page title at capture time */
  title?: string;

  /**
   * Free-text annotation. Groups and custom scripts fold it into their
   * description; for every other kind it replaces the generated text.
   */
  description?: string;

  /** Disabled events stay in the tree but never produce executable code */
  disabled?: boolean;
}

export type MouseButton = "LEFT" | "MIDDLE" | "RIGHT";

export interface ClickEvent extends BaseEvent {
  type: "CLICK";
  element?: ElementInfo;
  button?: MouseButton;
  doubleClick?: boolean;
  ctrlKey?: boolean;
  shiftKey?: boolean;
  altKey?: boolean;
  metaKey?: boolean;
}

export type InputType =
  | "TEXT"
  | "SELECT"
  | "CHECKBOX"
  | "RADIO"
  | "FILE"
  | "DATE"
  | "COLOR"
  | "RANGE"
  | "CONTENTEDITABLE";

export interface InputEvent extends BaseEvent {
  type: "INPUT";
  element?: ElementInfo;
  value?: string;
  previousValue?: string;
  inputType?: InputType;
  clearFirst?: boolean;
  passwordField?: boolean;

  /** Value was replaced by a mask before leaving the page */
  masked?: boolean;

  /** File names chosen in a file picker */
  selectedFiles?: string[];
}

export type NavigationTrigger =
  | "LINK_CLICK"
  | "FORM_SUBMISSION"
  | "SCRIPT"
  | "USER_INITIATED"
  | "REDIRECT"
  | "RELOAD"
  | "BACK_BUTTON"
  | "FORWARD_BUTTON"
  | "ADDRESS_BAR"
  | "HISTORY_API"
  | "OTHER";

export interface NavigationEvent extends BaseEvent {
  type: "NAVIGATION";
  sourceUrl?: string;
  targetUrl: string;
  trigger?: NavigationTrigger;
  back?: boolean;
  forward?: boolean;
  refresh?: boolean;
  redirect?: boolean;
  loadTimeMs?: number;
}

export type AssertionType =
  | "PRESENT"
  | "VISIBLE"
  | "ENABLED"
  | "SELECTED"
  | "TEXT_EQUALS"
  | "TEXT_CONTAINS"
  | "ATTRIBUTE_EQUALS"
  | "ATTRIBUTE_CONTAINS"
  | "URL"
  | "URL_CONTAINS"
  | "TITLE"
  | "TITLE_CONTAINS"
  | "EQUALS"
  | "CONTAINS"
  | "STARTS_WITH"
  | "ENDS_WITH"
  | "REGEX_MATCH"
  | "GREATER_THAN"
  | "LESS_THAN"
  | "GREATER_THAN_OR_EQUALS"
  | "LESS_THAN_OR_EQUALS"
  | "COUNT_EQUALS"
  | "COUNT_GREATER_THAN"
  | "COUNT_LESS_THAN"
  | "CUSTOM_JAVASCRIPT";

export type AssertionStatus = "NOT_EXECUTED" | "PASSED" | "FAILED" | "ERROR";

export interface AssertionEvent extends BaseEvent {
  type: "ASSERTION";
  assertionType: AssertionType;
  element?: ElementInfo;
  expectedValue?: string | null;

  /** Attribute compared by ATTRIBUTE_EQUALS / ATTRIBUTE_CONTAINS */
  attributeName?: string;

  negated?: boolean;

  /**
   * Soft assertions should not stop a run on failure. Carried for the
   * execution engine; nothing in this repository acts on it.
   */
  soft?: boolean;

  /** String comparisons ignore case unless this is true */
  caseSensitive?: boolean;

  /** Compare EQUALS numerically even without a tolerance */
  numeric?: boolean;

  /** Maximum allowed |actual - expected| for numeric EQUALS */
  tolerance?: number;

  customMessage?: string;

  /** Script evaluated by CUSTOM_JAVASCRIPT assertions; truthy passes */
  script?: string;

  status?: AssertionStatus;
  actualValue?: string | null;
}

export type CaptureSource =
  | "ELEMENT"
  | "RESPONSE"
  | "JAVASCRIPT"
  | "URL"
  | "COOKIE"
  | "STORAGE";

export type CaptureMethod =
  | "PROPERTY"
  | "ATTRIBUTE"
  | "INNER_TEXT"
  | "INNER_HTML"
  | "TEXT_CONTENT"
  | "JSON_PATH"
  | "XPATH"
  | "REGEX"
  | "JAVASCRIPT";

export interface CaptureConfig {
  variableName: string;
  source: CaptureSource;
  method: CaptureMethod;
  element?: ElementInfo;
  selector?: string;

  /** Property, attribute, cookie or storage key (default "textContent") */
  property?: string;

  /** JSONPath, XPath, regex or script, depending on the method */
  expression?: string;

  defaultValue?: string;
  global?: boolean;
}

export interface CaptureEvent extends BaseEvent {
  type: "CAPTURE";
  capture: CaptureConfig;
}

export interface CustomJsEvent extends BaseEvent {
  type: "CUSTOM_JS";
  script: string;
  async?: boolean;
  timeoutMs?: number;
  returnVariables?: string[];
  useElementContext?: boolean;
  contextElement?: ElementInfo;
}

export interface GroupEvent extends BaseEvent {
  type: "GROUP";
  name: string;
  events: RecordedEvent[];
  collapsed?: boolean;
  color?: string;
}

export type LoopType = "COUNT" | "WHILE" | "UNTIL" | "FOR_EACH";

export interface LoopConfig {
  loopType: LoopType;
  iterationVariable: string;
  count?: number;
  condition?: ConditionConfig;
  dataSourceId?: string;
  dataSourcePath?: string;
  maxIterations?: number;
}

export interface LoopEvent extends BaseEvent {
  type: "LOOP";
  loop: LoopConfig;
  events: RecordedEvent[];
}

export type ConditionOperator =
  | "EQUALS"
  | "NOT_EQUALS"
  | "GREATER_THAN"
  | "LESS_THAN"
  | "GREATER_THAN_OR_EQUALS"
  | "LESS_THAN_OR_EQUALS"
  | "CONTAINS"
  | "NOT_CONTAINS"
  | "STARTS_WITH"
  | "ENDS_WITH"
  | "MATCHES"
  | "IS_TRUE"
  | "IS_FALSE";

export type Operand =
  | { type: "LITERAL"; value: string }
  | { type: "VARIABLE"; variableName: string }
  | { type: "ELEMENT"; element?: ElementInfo; property?: string };

export interface ConditionConfig {
  operator: ConditionOperator;
  left?: Operand;
  right?: Operand;
  negated?: boolean;

  /** Raw boolean expression, emitted verbatim instead of the operands */
  expression?: string;
}

export interface ConditionalEvent extends BaseEvent {
  type: "CONDITIONAL";
  condition?: ConditionConfig;
  thenEvents: RecordedEvent[];
  elseEvents: RecordedEvent[];
}

export interface TryCatchEvent extends BaseEvent {
  type: "TRY_CATCH";
  tryEvents: RecordedEvent[];
  catchEvents: RecordedEvent[];
  finallyEvents: RecordedEvent[];

  /** Name bound to the caught error (default "error") */
  errorVariable: string;

  catchErrorTypes?: string[];
  continueOnError?: boolean;
  logError?: boolean;
}

export type LeafEvent =
  | ClickEvent
  | InputEvent
  | NavigationEvent
  | AssertionEvent
  | CaptureEvent
  | CustomJsEvent;

export type ContainerEvent =
  | GroupEvent
  | LoopEvent
  | ConditionalEvent
  | TryCatchEvent;

/** Union type for all event kinds */
export type RecordedEvent = LeafEvent | ContainerEvent;

/** The event variant carrying a given discriminant */
export type EventOfKind<K extends EventKind> = Extract<
  RecordedEvent,
  { type: K }
>;

export function isContainerEvent(
  event: RecordedEvent
): event is ContainerEvent {
  return (
    event.type === "GROUP" ||
    event.type === "LOOP" ||
    event.type === "CONDITIONAL" ||
    event.type === "TRY_CATCH"
  );
}
