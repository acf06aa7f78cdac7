import type { LeafEvent } from "@testcast/core";

/**
 * Command key used to look a leaf event up in a renderer table.
 */
export function commandFor(event: LeafEvent): string {
  switch (event.type) {
    case "CLICK":
      if (event.doubleClick) return "doubleClick";
      return event.button === "RIGHT" ? "rightClick" : "click";
    case "INPUT":
      if (event.inputType === "SELECT") return "select";
      if (event.inputType === "FILE") return "upload";
      if (event.inputType === "CHECKBOX" || event.inputType === "RADIO") {
        return "check";
      }
      return "type";
    case "NAVIGATION":
      if (event.back) return "back";
      if (event.forward) return "forward";
      if (event.refresh) return "refresh";
      return "navigate";
    case "ASSERTION":
      return event.assertionType;
    case "CAPTURE":
      return event.capture.source;
    case "CUSTOM_JS":
      return "execute";
  }
}
