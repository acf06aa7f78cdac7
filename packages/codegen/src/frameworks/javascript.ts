/**
 * JavaScript profiles: Playwright Test, WebdriverIO and Cypress.
 */

import type {
  CaptureEvent,
  ClickEvent,
  InputEvent,
  Locator,
} from "@testcast/core";
import { NO_QUERIES } from "../context.js";
import type {
  FrameworkProfile,
  PageQueries,
  RenderContext,
  RenderFn,
  Target,
} from "../context.js";
import { QUERY_ASSERTIONS, QUERY_CAPTURES } from "../queries.js";
import {
  MODIFIER_KEYS,
  ariaSelector,
  bindScriptResult,
  str,
  withTarget,
} from "./shared.js";

// Playwright

function playwrightLocate(locator: Locator): string {
  const v = locator.value;
  switch (locator.strategy) {
    case "CSS":
    case "TAG":
      return `page.locator(${str(v)})`;
    case "ID":
      return `page.locator(${str(`#${v}`)})`;
    case "NAME":
      return `page.locator(${str(`[name=${JSON.stringify(v)}]`)})`;
    case "CLASS":
      return `page.locator(${str(`.${v}`)})`;
    case "LINK_TEXT":
      return `page.getByRole("link", { name: ${str(v)}, exact: true })`;
    case "PARTIAL_LINK_TEXT":
      return `page.getByRole("link", { name: ${str(v)} })`;
    case "ACCESSIBILITY_ID":
      return `page.getByLabel(${str(v)})`;
    default:
      return `page.locator(${str(`xpath=${v}`)})`;
  }
}

function clickOptions(event: ClickEvent, button?: string): string {
  const parts: string[] = [];
  if (button) {
    parts.push(`button: ${str(button)}`);
  }
  const modifiers = MODIFIER_KEYS.filter(([flag]) => event[flag] === true).map(
    ([, key]) => str(key)
  );
  if (modifiers.length > 0) {
    parts.push(`modifiers: [${modifiers.join(", ")}]`);
  }
  return parts.length > 0 ? `{ ${parts.join(", ")} }` : "";
}

const isUnchecked = (event: InputEvent): boolean =>
  event.value?.trim().toLowerCase() === "false";

const PLAYWRIGHT_QUERIES: PageQueries = {
  ...NO_QUERIES,
  text: (t) => `(await ${t.expr}.innerText())`,
  attribute: (t, name) => `(await ${t.expr}.getAttribute(${str(name)}))`,
  property: (t, name) =>
    `(await ${t.expr}.evaluate((el, name) => el[name], ${str(name)}))`,
  visible: (t) => `(await ${t.expr}.isVisible())`,
  enabled: (t) => `(await ${t.expr}.isEnabled())`,
  selected: (t) => `(await ${t.expr}.isChecked())`,
  count: (t) => `(await ${t.expr}.count())`,
  url: () => "page.url()",
  title: () => "(await page.title())",
  evaluate: (expression) => `(await page.evaluate(${str(expression)}))`,
  cookie: (name) =>
    `(await page.context().cookies()).find((c) => c.name === ${str(name)})?.value`,
  storage: (key) =>
    `(await page.evaluate(${str(`window.localStorage.getItem(${str(key)})`)}))`,
};

export const javascriptPlaywright: FrameworkProfile = {
  language: "javascript",
  framework: "playwright",
  imports: ['import { test, expect } from "@playwright/test";'],
  wrapper: {
    open: ['test("recorded test", async ({ page }) => {'],
    close: ["});"],
    bodyDepth: 1,
  },
  setup: [],
  teardown: [],
  locate: playwrightLocate,
  queries: PLAYWRIGHT_QUERIES,
  assertTrue: (expr, message) => [`expect(${expr}, ${str(message)}).toBe(true);`],
  renderers: {
    CLICK: {
      click: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [`await ${t.expr}.click(${clickOptions(e)});`]),
      doubleClick: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [
          `await ${t.expr}.dblclick(${clickOptions(e)});`,
        ]),
      rightClick: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [
          `await ${t.expr}.click(${clickOptions(e, "right")});`,
        ]),
    },
    INPUT: {
      type: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [`await ${t.expr}.fill(${ctx.value(e.value)});`]),
      select: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [
          `await ${t.expr}.selectOption(${ctx.value(e.value)});`,
        ]),
      upload: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [
          `await ${t.expr}.setInputFiles([${(e.selectedFiles ?? []).map(str).join(", ")}]);`,
        ]),
      check: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [
          `await ${t.expr}.${isUnchecked(e) ? "uncheck" : "check"}();`,
        ]),
    },
    NAVIGATION: {
      navigate: (e, ctx) => [`await page.goto(${ctx.value(e.targetUrl)});`],
      back: () => ["await page.goBack();"],
      forward: () => ["await page.goForward();"],
      refresh: () => ["await page.reload();"],
    },
    ASSERTION: QUERY_ASSERTIONS,
    CAPTURE: QUERY_CAPTURES,
    CUSTOM_JS: {
      execute: (e, ctx) => {
        const prefix = e.async ? "async " : "";
        let call = `await page.evaluate(${str(`${prefix}() => { ${e.script} }`)})`;
        if (e.useElementContext) {
          const target = ctx.target(e.contextElement);
          if (!target) return null;
          call = `await ${target.expr}.evaluate(${str(`${prefix}(element) => { ${e.script} }`)})`;
        }
        return [bindScriptResult(call, e.returnVariables, ctx)];
      },
    },
  },
};

// WebdriverIO

function wdioSelector(locator: Locator): string {
  const v = locator.value;
  switch (locator.strategy) {
    case "CSS":
      return str(v);
    case "ID":
      return str(`#${v}`);
    case "NAME":
      return str(`[name=${JSON.stringify(v)}]`);
    case "TAG":
      return str(`<${v} />`);
    case "CLASS":
      return str(`.${v}`);
    case "LINK_TEXT":
      return str(`=${v}`);
    case "PARTIAL_LINK_TEXT":
      return str(`*=${v}`);
    case "ACCESSIBILITY_ID":
      return str(`~${v}`);
    default:
      return str(v);
  }
}

const $ = (t: Target): string => `$(${t.expr})`;

const WDIO_QUERIES: PageQueries = {
  ...NO_QUERIES,
  text: (t) => `(await ${$(t)}.getText())`,
  attribute: (t, name) => `(await ${$(t)}.getAttribute(${str(name)}))`,
  property: (t, name) => `(await ${$(t)}.getProperty(${str(name)}))`,
  visible: (t) => `(await ${$(t)}.isDisplayed())`,
  enabled: (t) => `(await ${$(t)}.isEnabled())`,
  selected: (t) => `(await ${$(t)}.isSelected())`,
  count: (t) => `(await $$(${t.expr}).length)`,
  url: () => "(await browser.getUrl())",
  title: () => "(await browser.getTitle())",
  evaluate: (expression) => `(await browser.execute(${str(`return ${expression}`)}))`,
  cookie: (name) => `(await browser.getCookies([${str(name)}]))[0]?.value`,
  storage: (key) =>
    `(await browser.execute(${str(`return window.localStorage.getItem(${str(key)})`)}))`,
};

export const javascriptWebdriverio: FrameworkProfile = {
  language: "javascript",
  framework: "webdriverio",
  imports: ['import { browser, $, $$, expect } from "@wdio/globals";'],
  setup: [],
  teardown: [],
  locate: wdioSelector,
  queries: WDIO_QUERIES,
  renderers: {
    CLICK: {
      click: (e, ctx) => withTarget(e.element, ctx, (t) => [`await ${$(t)}.click();`]),
      doubleClick: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [`await ${$(t)}.doubleClick();`]),
      rightClick: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [`await ${$(t)}.click({ button: "right" });`]),
    },
    INPUT: {
      type: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [
          `await ${$(t)}.${e.clearFirst === false ? "addValue" : "setValue"}(${ctx.value(e.value)});`,
        ]),
      select: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [
          `await ${$(t)}.selectByVisibleText(${ctx.value(e.value)});`,
        ]),
      upload: (e, ctx) =>
        withTarget(e.element, ctx, (t) =>
          (e.selectedFiles ?? []).map(
            (file) => `await ${$(t)}.addValue(await browser.uploadFile(${str(file)}));`
          )
        ),
      check: (e, ctx) => withTarget(e.element, ctx, (t) => [`await ${$(t)}.click();`]),
    },
    NAVIGATION: {
      navigate: (e, ctx) => [`await browser.url(${ctx.value(e.targetUrl)});`],
      back: () => ["await browser.back();"],
      forward: () => ["await browser.forward();"],
      refresh: () => ["await browser.refresh();"],
    },
    ASSERTION: QUERY_ASSERTIONS,
    CAPTURE: QUERY_CAPTURES,
    CUSTOM_JS: {
      execute: (e, ctx) => {
        const args = [str(e.script)];
        if (e.useElementContext) {
          const target = ctx.target(e.contextElement);
          if (!target) return null;
          args.push(`await ${$(target)}`);
        }
        const method = e.async ? "executeAsync" : "execute";
        return [bindScriptResult(`await browser.${method}(${args.join(", ")})`, e.returnVariables, ctx)];
      },
    },
  },
};

// Cypress

function cypressChain(locator: Locator): string {
  const v = locator.value;
  switch (locator.strategy) {
    case "CSS":
    case "TAG":
      return `cy.get(${str(v)})`;
    case "ID":
      return `cy.get(${str(`#${v}`)})`;
    case "NAME":
      return `cy.get(${str(`[name=${JSON.stringify(v)}]`)})`;
    case "CLASS":
      return `cy.get(${str(`.${v}`)})`;
    case "LINK_TEXT":
    case "PARTIAL_LINK_TEXT":
      return `cy.contains("a", ${str(v)})`;
    case "ACCESSIBILITY_ID":
      return `cy.get(${str(ariaSelector(v))})`;
    default:
      return `cy.xpath(${str(v)})`;
  }
}

/** jQuery selector for synchronous Cypress.$ reads; XPath has none */
function jquerySelector(locator: Locator): string | null {
  const v = locator.value;
  switch (locator.strategy) {
    case "CSS":
    case "TAG":
      return v;
    case "ID":
      return `#${v}`;
    case "NAME":
      return `[name=${JSON.stringify(v)}]`;
    case "CLASS":
      return `.${v}`;
    case "LINK_TEXT":
    case "PARTIAL_LINK_TEXT":
      return `a:contains(${JSON.stringify(v)})`;
    case "ACCESSIBILITY_ID":
      return ariaSelector(v);
    default:
      return null;
  }
}

function jquery(t: Target, read: string): string | null {
  const selector = jquerySelector(t.locator);
  return selector === null ? null : `Cypress.$(${str(selector)}).${read}`;
}

const CYPRESS_QUERIES: PageQueries = {
  ...NO_QUERIES,
  text: (t) => jquery(t, "text()"),
  attribute: (t, name) => jquery(t, `attr(${str(name)})`),
  property: (t, name) => jquery(t, `prop(${str(name)})`),
  visible: (t) => jquery(t, 'is(":visible")'),
  enabled: (t) => jquery(t, 'is(":enabled")'),
  selected: (t) => jquery(t, 'is(":checked")'),
  count: (t) => jquery(t, "length"),
  url: () => "url",
  title: () => "title",
  evaluate: (expression) => `win.eval(${str(expression)})`,
};

const CYPRESS_SUBJECTS = {
  element: "cy.wrap(null).should(() => {",
  url: "cy.url().should((url) => {",
  title: "cy.title().should((title) => {",
  script: "cy.window().should((win) => {",
} as const;

function cypressState(chainer: string): RenderFn<"ASSERTION"> {
  return (e, ctx) =>
    withTarget(e.element, ctx, (t) => [
      `${t.expr}.should(${str(e.negated ? `not.${chainer}` : chainer)});`,
    ]);
}

function cypressCaptureChain(event: CaptureEvent, ctx: RenderContext): string | null {
  const capture = event.capture;
  switch (capture.source) {
    case "ELEMENT": {
      let target: Target | null = null;
      if (capture.element) {
        target = ctx.target(capture.element);
      } else if (capture.selector) {
        target = ctx.targetFromSelector(capture.selector);
      }
      if (!target) return null;
      switch (capture.method) {
        case "ATTRIBUTE":
          return `${target.expr}.invoke("attr", ${str(capture.property ?? "")})`;
        case "PROPERTY":
          return `${target.expr}.invoke("prop", ${str(capture.property ?? "textContent")})`;
        case "INNER_HTML":
          return `${target.expr}.invoke("html")`;
        default:
          return `${target.expr}.invoke("text")`;
      }
    }
    case "URL":
      return capture.method === "REGEX" && capture.expression
        ? `cy.url().then((url) => (url.match(new RegExp(${str(capture.expression)})) ?? [])[1])`
        : "cy.url()";
    case "COOKIE":
      return `cy.getCookie(${str(capture.property ?? "")}).its("value")`;
    case "STORAGE":
      return `cy.window().its("localStorage").invoke("getItem", ${str(capture.property ?? "")})`;
    case "JAVASCRIPT":
      return `cy.window().then((win) => win.eval(${str(capture.expression ?? "")}))`;
    case "RESPONSE":
      return null;
  }
}

/** Cypress captures become aliases, read back with cy.get("@name") */
const cypressCapture: RenderFn<"CAPTURE"> = (e, ctx) => {
  const chain = cypressCaptureChain(e, ctx);
  return chain === null ? null : [`${chain}.as(${str(e.capture.variableName)});`];
};

export const javascriptCypress: FrameworkProfile = {
  language: "javascript",
  framework: "cypress",
  imports: ['/// <reference types="cypress" />'],
  wrapper: {
    open: [
      'describe("Recorded test", () => {',
      '\tit("replays the recorded steps", () => {',
    ],
    close: ["\t});", "});"],
    bodyDepth: 2,
  },
  setup: [],
  teardown: [],
  locate: cypressChain,
  queries: CYPRESS_QUERIES,
  assertTrue: (expr, message, subject, ctx) => [
    CYPRESS_SUBJECTS[subject],
    `${ctx.syntax.indentUnit}expect(${expr}, ${str(message)}).to.equal(true);`,
    "});",
  ],
  renderers: {
    CLICK: {
      click: (e, ctx) => withTarget(e.element, ctx, (t) => [`${t.expr}.click();`]),
      doubleClick: (e, ctx) => withTarget(e.element, ctx, (t) => [`${t.expr}.dblclick();`]),
      rightClick: (e, ctx) => withTarget(e.element, ctx, (t) => [`${t.expr}.rightclick();`]),
    },
    INPUT: {
      type: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [
          `${t.expr}${e.clearFirst ? ".clear()" : ""}.type(${ctx.value(e.value)});`,
        ]),
      select: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [`${t.expr}.select(${ctx.value(e.value)});`]),
      upload: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [
          `${t.expr}.selectFile([${(e.selectedFiles ?? []).map(str).join(", ")}]);`,
        ]),
      check: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [
          `${t.expr}.${isUnchecked(e) ? "uncheck" : "check"}();`,
        ]),
    },
    NAVIGATION: {
      navigate: (e, ctx) => [`cy.visit(${ctx.value(e.targetUrl)});`],
      back: () => ['cy.go("back");'],
      forward: () => ['cy.go("forward");'],
      refresh: () => ["cy.reload();"],
    },
    ASSERTION: {
      ...QUERY_ASSERTIONS,
      PRESENT: cypressState("exist"),
      VISIBLE: cypressState("be.visible"),
      ENABLED: cypressState("be.enabled"),
      SELECTED: cypressState("be.checked"),
    },
    CAPTURE: {
      ELEMENT: cypressCapture,
      URL: cypressCapture,
      COOKIE: cypressCapture,
      STORAGE: cypressCapture,
      JAVASCRIPT: cypressCapture,
    },
    CUSTOM_JS: {
      execute: (e) => {
        const name = e.returnVariables?.[0];
        const chain = `cy.window().then((win) => win.eval(${str(e.script)}))`;
        return [name ? `${chain}.as(${str(name)});` : `${chain};`];
      },
    },
  },
};
