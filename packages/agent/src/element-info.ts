/**
 * Element snapshots sent with every interaction.
 */

import type { ElementInfo } from "@testcast/core";

const TEXT_LIMIT = 100;
export const PASSWORD_MASK = "********";

function isUnique(doc: Document, selector: string): boolean {
  try {
    return doc.querySelectorAll(selector).length === 1;
  } catch {
    // class or name values that do not form a valid selector
    return false;
  }
}

/**
 * CSS selector for an element, unique in its document when possible.
 * Tries #id, tag.classes, tag[name], then a :nth-child step under the
 * parent (anchored on the parent's id when it has one).
 */
export function cssSelector(element: Element): string {
  if (element.id) {
    return `#${element.id}`;
  }
  const doc = element.ownerDocument;
  const tag = element.tagName.toLowerCase();

  const classes = (element.getAttribute("class") ?? "").split(/\s+/).filter(Boolean);
  if (classes.length > 0) {
    const selector = `${tag}.${classes.join(".")}`;
    if (isUnique(doc, selector)) {
      return selector;
    }
  }

  let selector = tag;
  const name = element.getAttribute("name");
  if (name) {
    selector += `[name=${JSON.stringify(name)}]`;
    if (isUnique(doc, selector)) {
      return selector;
    }
  }

  const parent = element.parentElement;
  if (!parent) {
    return selector;
  }
  const index = Array.from(parent.children).indexOf(element) + 1;
  selector += `:nth-child(${index})`;
  return parent.id
    ? `#${parent.id} > ${selector}`
    : `${parent.tagName.toLowerCase()} > ${selector}`;
}

/**
 * XPath for an element: anchored on the nearest ancestor with an id,
 * otherwise absolute from the root.
 */
export function xpath(element: Element): string {
  if (element.id) {
    return `//*[@id=${JSON.stringify(element.id)}]`;
  }

  const steps: string[] = [];
  let current: Element | null = element;
  while (current) {
    if (current.id) {
      return `//*[@id=${JSON.stringify(current.id)}]/${steps.join("/")}`;
    }
    const tag = current.tagName.toLowerCase();
    const parent: Element | null = current.parentElement;
    let step = tag;
    if (parent) {
      const sameTag = Array.from(parent.children).filter(
        (sibling) => sibling.tagName === current?.tagName
      );
      if (sameTag.length > 1) {
        step += `[${sameTag.indexOf(current) + 1}]`;
      }
    }
    steps.unshift(step);
    current = parent;
  }
  return `/${steps.join("/")}`;
}

function formValue(element: Element): string | undefined {
  if (
    element instanceof HTMLInputElement ||
    element instanceof HTMLTextAreaElement ||
    element instanceof HTMLSelectElement
  ) {
    return element.value;
  }
  return undefined;
}

/**
 * Snapshot of an element; empty fields stay undefined. A password field's
 * value and value attribute are masked.
 */
export function elementInfo(element: Element): ElementInfo {
  const attr = (name: string): string | undefined => element.getAttribute(name) || undefined;
  const rect = element.getBoundingClientRect();
  const password = element instanceof HTMLInputElement && element.type === "password";
  const mask = (value: string): string => (password && value ? PASSWORD_MASK : value);
  const attributes: Record<string, string> = {};
  for (const attribute of Array.from(element.attributes)) {
    attributes[attribute.name] =
      attribute.name === "value" ? mask(attribute.value) : attribute.value;
  }

  return {
    tagName: element.tagName.toLowerCase(),
    id: element.id || undefined,
    className: attr("class"),
    name: attr("name"),
    type: attr("type"),
    value: mask(formValue(element) ?? "") || undefined,
    text: element.textContent?.trim().slice(0, TEXT_LIMIT) || undefined,
    cssSelector: cssSelector(element),
    xpath: xpath(element),
    href: attr("href"),
    src: attr("src"),
    alt: attr("alt"),
    placeholder: attr("placeholder"),
    attributes,
    boundingRect: { x: rect.left, y: rect.top, width: rect.width, height: rect.height },
  };
}
