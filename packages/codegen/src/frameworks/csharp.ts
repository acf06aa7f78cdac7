/**
 * C# profiles: Selenium and Playwright on NUnit, and SpecFlow bindings.
 */

import type { ClickEvent, Locator } from "@testcast/core";
import { NO_QUERIES } from "../context.js";
import type { FrameworkProfile, PageQueries, RendererTable, Target } from "../context.js";
import { QUERY_ASSERTIONS, QUERY_CAPTURES } from "../queries.js";
import {
  MODIFIER_KEYS,
  ariaSelector,
  bindScriptResult,
  str,
  withTarget,
} from "./shared.js";

const SYSTEM_USINGS = [
  "using System;",
  "using System.Collections.Generic;",
  "using System.Linq;",
];

const SELENIUM_USINGS = [
  ...SYSTEM_USINGS,
  "using NUnit.Framework;",
  "using OpenQA.Selenium;",
  "using OpenQA.Selenium.Chrome;",
  "using OpenQA.Selenium.Interactions;",
  "using OpenQA.Selenium.Support.UI;",
];

function byLocator(locator: Locator): string {
  const v = str(locator.value);
  switch (locator.strategy) {
    case "CSS":
      return `By.CssSelector(${v})`;
    case "ID":
      return `By.Id(${v})`;
    case "NAME":
      return `By.Name(${v})`;
    case "TAG":
      return `By.TagName(${v})`;
    case "CLASS":
      return `By.ClassName(${v})`;
    case "LINK_TEXT":
      return `By.LinkText(${v})`;
    case "PARTIAL_LINK_TEXT":
      return `By.PartialLinkText(${v})`;
    case "ACCESSIBILITY_ID":
      return `By.CssSelector(${str(ariaSelector(locator.value))})`;
    default:
      return `By.XPath(${v})`;
  }
}

const find = (t: Target): string => `driver.FindElement(${t.expr})`;
const script = (body: string): string =>
  `((IJavaScriptExecutor)driver).ExecuteScript(${str(body)})`;

const SELENIUM_QUERIES: PageQueries = {
  ...NO_QUERIES,
  text: (t) => `${find(t)}.Text`,
  attribute: (t, name) => `${find(t)}.GetAttribute(${str(name)})`,
  property: (t, name) => `${find(t)}.GetDomProperty(${str(name)})`,
  visible: (t) => `${find(t)}.Displayed`,
  enabled: (t) => `${find(t)}.Enabled`,
  selected: (t) => `${find(t)}.Selected`,
  count: (t) => `driver.FindElements(${t.expr}).Count`,
  url: () => "driver.Url",
  title: () => "driver.Title",
  evaluate: (expression) => script(`return ${expression}`),
  cookie: (name) => `driver.Manage().Cookies.GetCookieNamed(${str(name)}).Value`,
  storage: (key) => script(`return window.localStorage.getItem(${str(key)})`),
};

const SELENIUM_RENDERERS: RendererTable = {
  CLICK: {
    click: (e, ctx) => withTarget(e.element, ctx, (t) => [`${find(t)}.Click();`]),
    doubleClick: (e, ctx) =>
      withTarget(e.element, ctx, (t) => [
        `new Actions(driver).DoubleClick(${find(t)}).Perform();`,
      ]),
    rightClick: (e, ctx) =>
      withTarget(e.element, ctx, (t) => [
        `new Actions(driver).ContextClick(${find(t)}).Perform();`,
      ]),
  },
  INPUT: {
    type: (e, ctx) =>
      withTarget(e.element, ctx, (t) => [
        ...(e.clearFirst ? [`${find(t)}.Clear();`] : []),
        `${find(t)}.SendKeys(${ctx.value(e.value)});`,
      ]),
    select: (e, ctx) =>
      withTarget(e.element, ctx, (t) => [
        `new SelectElement(${find(t)}).SelectByText(${ctx.value(e.value)});`,
      ]),
    upload: (e, ctx) =>
      withTarget(e.element, ctx, (t) => [
        `${find(t)}.SendKeys(${str((e.selectedFiles ?? []).join("\n"))});`,
      ]),
    check: (e, ctx) => withTarget(e.element, ctx, (t) => [`${find(t)}.Click();`]),
  },
  NAVIGATION: {
    navigate: (e, ctx) => [`driver.Navigate().GoToUrl(${ctx.value(e.targetUrl)});`],
    back: () => ["driver.Navigate().Back();"],
    forward: () => ["driver.Navigate().Forward();"],
    refresh: () => ["driver.Navigate().Refresh();"],
  },
  ASSERTION: QUERY_ASSERTIONS,
  CAPTURE: QUERY_CAPTURES,
  CUSTOM_JS: {
    execute: (e, ctx) => {
      const args = [str(e.script)];
      if (e.useElementContext) {
        const target = ctx.target(e.contextElement);
        if (!target) return null;
        args.push(find(target));
      }
      const method = e.async ? "ExecuteAsyncScript" : "ExecuteScript";
      const call = `((IJavaScriptExecutor)driver).${method}(${args.join(", ")})`;
      return [bindScriptResult(call, e.returnVariables, ctx)];
    },
  },
};

export const csharpSelenium: FrameworkProfile = {
  language: "csharp",
  framework: "selenium",
  imports: SELENIUM_USINGS,
  setup: ["IWebDriver driver = new ChromeDriver();"],
  teardown: ["driver.Quit();"],
  locate: byLocator,
  queries: SELENIUM_QUERIES,
  renderers: SELENIUM_RENDERERS,
};

export const csharpSpecflow: FrameworkProfile = {
  language: "csharp",
  framework: "specflow",
  imports: [...SELENIUM_USINGS, "using TechTalk.SpecFlow;"],
  wrapper: {
    open: [
      "[Binding]",
      "public class RecordedSteps",
      "{",
      "\tprivate readonly IWebDriver driver = new ChromeDriver();",
      "",
      "\t[AfterScenario]",
      "\tpublic void TearDown()",
      "\t{",
      "\t\tdriver.Quit();",
      "\t}",
      "",
      '\t[When("the recorded steps are replayed")]',
      "\tpublic void WhenTheRecordedStepsAreReplayed()",
      "\t{",
    ],
    close: ["\t}", "}"],
    bodyDepth: 2,
  },
  setup: [],
  teardown: [],
  locate: byLocator,
  queries: SELENIUM_QUERIES,
  renderers: SELENIUM_RENDERERS,
};

// Playwright for .NET

function playwrightLocate(locator: Locator): string {
  const v = locator.value;
  switch (locator.strategy) {
    case "CSS":
    case "TAG":
      return `Page.Locator(${str(v)})`;
    case "ID":
      return `Page.Locator(${str(`#${v}`)})`;
    case "NAME":
      return `Page.Locator(${str(`[name=${JSON.stringify(v)}]`)})`;
    case "CLASS":
      return `Page.Locator(${str(`.${v}`)})`;
    case "LINK_TEXT":
      return `Page.GetByRole(AriaRole.Link, new() { Name = ${str(v)}, Exact = true })`;
    case "PARTIAL_LINK_TEXT":
      return `Page.GetByRole(AriaRole.Link, new() { Name = ${str(v)} })`;
    case "ACCESSIBILITY_ID":
      return `Page.GetByLabel(${str(v)})`;
    default:
      return `Page.Locator(${str(`xpath=${v}`)})`;
  }
}

function clickOptions(event: ClickEvent, right: boolean): string {
  const parts: string[] = [];
  if (right) {
    parts.push("Button = MouseButton.Right");
  }
  const modifiers = MODIFIER_KEYS.filter(([flag]) => event[flag] === true).map(
    ([, key]) => `KeyboardModifier.${key}`
  );
  if (modifiers.length > 0) {
    parts.push(`Modifiers = new[] { ${modifiers.join(", ")} }`);
  }
  return parts.length > 0 ? `new() { ${parts.join(", ")} }` : "";
}

const evaluate = (body: string): string =>
  `(await Page.EvaluateAsync<object>(${str(body)}))`;

export const csharpPlaywright: FrameworkProfile = {
  language: "csharp",
  framework: "playwright",
  imports: [
    ...SYSTEM_USINGS,
    "using System.Threading.Tasks;",
    "using Microsoft.Playwright;",
    "using Microsoft.Playwright.NUnit;",
    "using NUnit.Framework;",
  ],
  wrapper: {
    open: [
      "[TestFixture]",
      "public class RecordedTest : PageTest",
      "{",
      "\t[Test]",
      "\tpublic async Task RecordedSteps()",
      "\t{",
    ],
    close: ["\t}", "}"],
    bodyDepth: 2,
  },
  setup: [],
  teardown: [],
  locate: playwrightLocate,
  queries: {
    ...NO_QUERIES,
    text: (t) => `(await ${t.expr}.InnerTextAsync())`,
    attribute: (t, name) => `(await ${t.expr}.GetAttributeAsync(${str(name)}))`,
    property: (t, name) =>
      `(await ${t.expr}.EvaluateAsync<object>(${str(`(el) => el[${JSON.stringify(name)}]`)}))`,
    visible: (t) => `(await ${t.expr}.IsVisibleAsync())`,
    enabled: (t) => `(await ${t.expr}.IsEnabledAsync())`,
    selected: (t) => `(await ${t.expr}.IsCheckedAsync())`,
    count: (t) => `(await ${t.expr}.CountAsync())`,
    url: () => "Page.Url",
    title: () => "(await Page.TitleAsync())",
    evaluate: (expression) => evaluate(expression),
    cookie: (name) =>
      `(await Page.Context.CookiesAsync()).First(c => c.Name == ${str(name)}).Value`,
    storage: (key) => evaluate(`window.localStorage.getItem(${str(key)})`),
  },
  renderers: {
    CLICK: {
      click: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [`await ${t.expr}.ClickAsync(${clickOptions(e, false)});`]),
      doubleClick: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [
          `await ${t.expr}.DblClickAsync(${clickOptions(e, false)});`,
        ]),
      rightClick: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [`await ${t.expr}.ClickAsync(${clickOptions(e, true)});`]),
    },
    INPUT: {
      type: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [`await ${t.expr}.FillAsync(${ctx.value(e.value)});`]),
      select: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [
          `await ${t.expr}.SelectOptionAsync(${ctx.value(e.value)});`,
        ]),
      upload: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [
          `await ${t.expr}.SetInputFilesAsync(new[] { ${(e.selectedFiles ?? []).map(str).join(", ")} });`,
        ]),
      check: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [
          `await ${t.expr}.${e.value?.trim().toLowerCase() === "false" ? "UncheckAsync" : "CheckAsync"}();`,
        ]),
    },
    NAVIGATION: {
      navigate: (e, ctx) => [`await Page.GotoAsync(${ctx.value(e.targetUrl)});`],
      back: () => ["await Page.GoBackAsync();"],
      forward: () => ["await Page.GoForwardAsync();"],
      refresh: () => ["await Page.ReloadAsync();"],
    },
    ASSERTION: QUERY_ASSERTIONS,
    CAPTURE: QUERY_CAPTURES,
    CUSTOM_JS: {
      execute: (e, ctx) => {
        const prefix = e.async ? "async " : "";
        let call = `await Page.EvaluateAsync<object>(${str(`${prefix}() => { ${e.script} }`)})`;
        if (e.useElementContext) {
          const target = ctx.target(e.contextElement);
          if (!target) return null;
          call = `await ${target.expr}.EvaluateAsync<object>(${str(`${prefix}(element) => { ${e.script} }`)})`;
        }
        return [bindScriptResult(call, e.returnVariables, ctx)];
      },
    },
  },
};
