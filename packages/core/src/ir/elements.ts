/**
 * Element snapshot helpers shared by descriptions, validation and codegen.
 */

import type { ElementInfo, Locator } from "../types/index.js";

export function hasText(value: string | undefined | null): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

/** Shorten display text to `max` characters, ending in "..." when cut */
export function truncateText(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max - 3)}...` : value;
}

/**
 * Most specific selector available for an element.
 * Order: #id, computed CSS, XPath, free-form selector, explicit locator.
 */
export function bestSelector(
  element: ElementInfo | undefined
): string | undefined {
  if (!element) {
    return undefined;
  }
  if (hasText(element.id)) {
    return `#${element.id}`;
  }
  if (hasText(element.cssSelector)) {
    return element.cssSelector;
  }
  if (hasText(element.xpath)) {
    return element.xpath;
  }
  if (hasText(element.selector)) {
    return element.selector;
  }
  if (element.locator && hasText(element.locator.value)) {
    return element.locator.value;
  }
  return undefined;
}

function looksLikeXPath(selector: string): boolean {
  return selector.startsWith("/") || selector.startsWith("(");
}

/**
 * Locator a generated script should use for an element.
 * An explicit locator wins; otherwise one is derived from the snapshot.
 */
export function resolveLocator(
  element: ElementInfo | undefined
): Locator | undefined {
  if (!element) {
    return undefined;
  }
  if (element.locator && hasText(element.locator.value)) {
    return element.locator;
  }
  if (hasText(element.id)) {
    return { strategy: "ID", value: element.id };
  }
  if (hasText(element.cssSelector)) {
    return { strategy: "CSS", value: element.cssSelector };
  }
  if (hasText(element.xpath)) {
    return { strategy: "XPATH", value: element.xpath };
  }
  if (hasText(element.selector)) {
    return {
      strategy: looksLikeXPath(element.selector) ? "XPATH" : "CSS",
      value: element.selector,
    };
  }
  if (hasText(element.name)) {
    return { strategy: "NAME", value: element.name };
  }
  return undefined;
}

/**
 * Short phrase naming an element, e.g. "button with ID 'save'".
 */
export function describeElement(element: ElementInfo | undefined): string {
  if (!element) {
    return "element";
  }

  const selector = bestSelector(element) ?? "unknown";
  if (!hasText(element.tagName)) {
    return `element ${selector}`;
  }
  if (hasText(element.id)) {
    return `${element.tagName} with ID '${element.id}'`;
  }
  if (hasText(element.text)) {
    return `${element.tagName} with text '${truncateText(element.text, 20)}'`;
  }
  return `${element.tagName} element ${selector}`;
}
