export type {
  LeafKind,
  ContainerKind,
  EventKind,
  LocatorStrategy,
  Locator,
  BoundingRect,
  ElementInfo,
  BaseEvent,
  MouseButton,
  ClickEvent,
  InputType,
  InputEvent,
  NavigationTrigger,
  NavigationEvent,
  AssertionType,
  AssertionStatus,
  AssertionEvent,
  CaptureSource,
  CaptureMethod,
  CaptureConfig,
  CaptureEvent,
  CustomJsEvent,
  GroupEvent,
  LoopType,
  LoopConfig,
  LoopEvent,
  ConditionOperator,
  Operand,
  ConditionConfig,
  ConditionalEvent,
  TryCatchEvent,
  LeafEvent,
  ContainerEvent,
  RecordedEvent,
  EventOfKind,
} from "./events.js";
export {
  LEAF_KINDS,
  CONTAINER_KINDS,
  EVENT_KINDS,
  isContainerEvent,
} from "./events.js";

export type {
  SessionStatus,
  AdmissionConfig,
  TransportKind,
  Viewport,
  AgentInfo,
  AgentErrorReport,
  SessionSnapshot,
  SessionView,
  SessionSummary,
} from "./session.js";

export type {
  Language,
  VariableType,
  Variable,
  GenerationOptions,
  GenerationRequest,
  GenerationResult,
} from "./codegen.js";
export { LANGUAGES, isLanguage } from "./codegen.js";
