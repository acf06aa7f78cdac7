/**
 * DOM listeners that turn user interactions into recorded events.
 * Listeners run in the capture phase and never wait on the network.
 */

import type {
  ClickEvent,
  InputEvent,
  InputType,
  MouseButton,
  RecordedEvent,
} from "@testcast/core";
import { PASSWORD_MASK, elementInfo } from "./element-info.js";

export { PASSWORD_MASK } from "./element-info.js";

export const INPUT_DEBOUNCE_MS = 500;

export interface CaptureSink {
  isRecording(): boolean;
  nextId(): string;
  now(): number;
  emit(event: RecordedEvent): void;

  /** The page is being left */
  unload(): void;
}

type FormField = HTMLInputElement | HTMLTextAreaElement | HTMLSelectElement;

function isFormField(target: EventTarget | null): target is FormField {
  return (
    target instanceof HTMLInputElement ||
    target instanceof HTMLTextAreaElement ||
    target instanceof HTMLSelectElement
  );
}

const INPUT_TYPES: Readonly<Record<string, InputType>> = {
  checkbox: "CHECKBOX",
  radio: "RADIO",
  file: "FILE",
  date: "DATE",
  color: "COLOR",
  range: "RANGE",
};

function inputTypeOf(field: FormField): InputType {
  if (field instanceof HTMLSelectElement) {
    return "SELECT";
  }
  if (field instanceof HTMLInputElement) {
    return INPUT_TYPES[field.type] ?? "TEXT";
  }
  return "TEXT";
}

function fieldValue(field: FormField): string {
  if (field instanceof HTMLInputElement && (field.type === "checkbox" || field.type === "radio")) {
    return String(field.checked);
  }
  return field.value;
}

function mouseButton(button: number): MouseButton {
  if (button === 2) return "RIGHT";
  if (button === 1) return "MIDDLE";
  return "LEFT";
}

/**
 * Attach capture listeners to a page. Returns a function that removes
 * them and drops any pending input.
 */
export function installCaptureListeners(win: Window, sink: CaptureSink): () => void {
  const doc = win.document;
  const lastValues = new WeakMap<FormField, string>();
  // Debounced per field so typing elsewhere does not drop a pending value
  const inputTimers = new Map<FormField, ReturnType<typeof setTimeout>>();

  const pageFields = () => ({
    timestamp: sink.now(),
    url: win.location.href,
    title: doc.title,
  });

  const click =
    (variant: "single" | "double" | "context") =>
    (event: MouseEvent): void => {
      if (!sink.isRecording() || !(event.target instanceof Element)) {
        return;
      }
      const recorded: ClickEvent = {
        id: sink.nextId(),
        type: "CLICK",
        ...pageFields(),
        element: elementInfo(event.target),
        button: variant === "context" ? "RIGHT" : mouseButton(event.button),
        ctrlKey: event.ctrlKey,
        shiftKey: event.shiftKey,
        altKey: event.altKey,
        metaKey: event.metaKey,
      };
      if (variant === "double") {
        recorded.doubleClick = true;
      }
      sink.emit(recorded);
    };

  const onClick = click("single");
  const onDoubleClick = click("double");
  const onContextMenu = click("context");

  const onInput = (event: Event): void => {
    const field = event.target;
    if (!sink.isRecording() || !isFormField(field)) {
      return;
    }
    const pending = inputTimers.get(field);
    if (pending !== undefined) {
      clearTimeout(pending);
    }

    const timer = setTimeout(() => {
      inputTimers.delete(field);
      const value = fieldValue(field);
      const previousValue = lastValues.get(field) ?? "";
      lastValues.set(field, value);
      const password = field instanceof HTMLInputElement && field.type === "password";
      const inputType = inputTypeOf(field);
      const recorded: InputEvent = {
        id: sink.nextId(),
        type: "INPUT",
        ...pageFields(),
        element: elementInfo(field),
        value: password ? PASSWORD_MASK : value,
        previousValue: password && previousValue ? PASSWORD_MASK : previousValue,
        inputType,
        passwordField: password,
        masked: password,
      };
      if (recorded.element) {
        recorded.element.value = recorded.value;
      }
      if (inputType === "FILE" && field instanceof HTMLInputElement) {
        recorded.selectedFiles = Array.from(field.files ?? []).map((file) => file.name);
      }
      sink.emit(recorded);
    }, INPUT_DEBOUNCE_MS);
    inputTimers.set(field, timer);
  };

  const onSubmit = (event: Event): void => {
    if (!sink.isRecording() || !(event.target instanceof HTMLFormElement)) {
      return;
    }
    const form = event.target;
    sink.emit({
      id: sink.nextId(),
      type: "NAVIGATION",
      ...pageFields(),
      sourceUrl: win.location.href,
      targetUrl: form.action || win.location.href,
      trigger: "FORM_SUBMISSION",
    });
  };

  const onBeforeUnload = (): void => {
    sink.unload();
  };

  doc.addEventListener("click", onClick, true);
  doc.addEventListener("dblclick", onDoubleClick, true);
  doc.addEventListener("contextmenu", onContextMenu, true);
  doc.addEventListener("input", onInput, true);
  doc.addEventListener("submit", onSubmit, true);
  win.addEventListener("beforeunload", onBeforeUnload);

  return () => {
    for (const timer of inputTimers.values()) {
      clearTimeout(timer);
    }
    inputTimers.clear();
    doc.removeEventListener("click", onClick, true);
    doc.removeEventListener("dblclick", onDoubleClick, true);
    doc.removeEventListener("contextmenu", onContextMenu, true);
    doc.removeEventListener("input", onInput, true);
    doc.removeEventListener("submit", onSubmit, true);
    win.removeEventListener("beforeunload", onBeforeUnload);
  };
}
