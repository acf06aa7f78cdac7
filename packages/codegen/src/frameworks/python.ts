/**
 * Python profiles: Selenium, pytest with a driver fixture, and a Robot
 * Framework keyword library driving SeleniumLibrary.
 */

import type { Locator } from "@testcast/core";
import { NO_QUERIES } from "../context.js";
import type { FrameworkProfile, PageQueries, RendererTable, Target } from "../context.js";
import { QUERY_ASSERTIONS, QUERY_CAPTURES } from "../queries.js";
import { ariaSelector, bindScriptResult, str, withTarget } from "./shared.js";

const SELENIUM_IMPORTS = [
  "from selenium import webdriver",
  "from selenium.webdriver.common.action_chains import ActionChains",
  "from selenium.webdriver.common.by import By",
  "from selenium.webdriver.support.ui import Select",
];

function byLocator(locator: Locator): string {
  const v = str(locator.value);
  switch (locator.strategy) {
    case "CSS":
      return `By.CSS_SELECTOR, ${v}`;
    case "ID":
      return `By.ID, ${v}`;
    case "NAME":
      return `By.NAME, ${v}`;
    case "TAG":
      return `By.TAG_NAME, ${v}`;
    case "CLASS":
      return `By.CLASS_NAME, ${v}`;
    case "LINK_TEXT":
      return `By.LINK_TEXT, ${v}`;
    case "PARTIAL_LINK_TEXT":
      return `By.PARTIAL_LINK_TEXT, ${v}`;
    case "ACCESSIBILITY_ID":
      return `By.CSS_SELECTOR, ${str(ariaSelector(locator.value))}`;
    default:
      return `By.XPATH, ${v}`;
  }
}

const find = (t: Target): string => `driver.find_element(${t.expr})`;

const SELENIUM_QUERIES: PageQueries = {
  ...NO_QUERIES,
  text: (t) => `${find(t)}.text`,
  attribute: (t, name) => `${find(t)}.get_attribute(${str(name)})`,
  property: (t, name) => `${find(t)}.get_property(${str(name)})`,
  visible: (t) => `${find(t)}.is_displayed()`,
  enabled: (t) => `${find(t)}.is_enabled()`,
  selected: (t) => `${find(t)}.is_selected()`,
  count: (t) => `len(driver.find_elements(${t.expr}))`,
  url: () => "driver.current_url",
  title: () => "driver.title",
  evaluate: (expression) => `driver.execute_script(${str(`return ${expression}`)})`,
  cookie: (name) => `driver.get_cookie(${str(name)})["value"]`,
  storage: (key) =>
    `driver.execute_script(${str(`return window.localStorage.getItem(${str(key)})`)})`,
};

const SELENIUM_RENDERERS: RendererTable = {
  CLICK: {
    click: (e, ctx) => withTarget(e.element, ctx, (t) => [`${find(t)}.click()`]),
    doubleClick: (e, ctx) =>
      withTarget(e.element, ctx, (t) => [
        `ActionChains(driver).double_click(${find(t)}).perform()`,
      ]),
    rightClick: (e, ctx) =>
      withTarget(e.element, ctx, (t) => [
        `ActionChains(driver).context_click(${find(t)}).perform()`,
      ]),
  },
  INPUT: {
    type: (e, ctx) =>
      withTarget(e.element, ctx, (t) => [
        ...(e.clearFirst ? [`${find(t)}.clear()`] : []),
        `${find(t)}.send_keys(${ctx.value(e.value)})`,
      ]),
    select: (e, ctx) =>
      withTarget(e.element, ctx, (t) => [
        `Select(${find(t)}).select_by_visible_text(${ctx.value(e.value)})`,
      ]),
    upload: (e, ctx) =>
      withTarget(e.element, ctx, (t) => [
        `${find(t)}.send_keys(${str((e.selectedFiles ?? []).join("\n"))})`,
      ]),
    check: (e, ctx) => withTarget(e.element, ctx, (t) => [`${find(t)}.click()`]),
  },
  NAVIGATION: {
    navigate: (e, ctx) => [`driver.get(${ctx.value(e.targetUrl)})`],
    back: () => ["driver.back()"],
    forward: () => ["driver.forward()"],
    refresh: () => ["driver.refresh()"],
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
      const method = e.async ? "execute_async_script" : "execute_script";
      return [bindScriptResult(`driver.${method}(${args.join(", ")})`, e.returnVariables, ctx)];
    },
  },
};

export const pythonSelenium: FrameworkProfile = {
  language: "python",
  framework: "selenium",
  imports: SELENIUM_IMPORTS,
  setup: ["driver = webdriver.Chrome()"],
  teardown: ["driver.quit()"],
  locate: byLocator,
  queries: SELENIUM_QUERIES,
  renderers: SELENIUM_RENDERERS,
};

export const pythonPytest: FrameworkProfile = {
  language: "python",
  framework: "pytest",
  imports: ["import pytest", ...SELENIUM_IMPORTS],
  wrapper: {
    open: [
      "@pytest.fixture",
      "def driver():",
      "\tdriver = webdriver.Chrome()",
      "\tyield driver",
      "\tdriver.quit()",
      "",
      "",
      "def test_recorded(driver):",
    ],
    close: [],
    bodyDepth: 1,
  },
  setup: [],
  teardown: [],
  locate: byLocator,
  queries: SELENIUM_QUERIES,
  renderers: SELENIUM_RENDERERS,
};

// Robot Framework

function robotLocator(locator: Locator): string {
  const v = locator.value;
  switch (locator.strategy) {
    case "CSS":
      return str(`css:${v}`);
    case "ID":
      return str(`id:${v}`);
    case "NAME":
      return str(`name:${v}`);
    case "TAG":
      return str(`tag:${v}`);
    case "CLASS":
      return str(`class:${v}`);
    case "LINK_TEXT":
      return str(`link:${v}`);
    case "PARTIAL_LINK_TEXT":
      return str(`partial link:${v}`);
    case "ACCESSIBILITY_ID":
      return str(`css:${ariaSelector(v)}`);
    default:
      return str(`xpath:${v}`);
  }
}

const element = (t: Target): string => `selib.find_element(${t.expr})`;
const robotScript = (body: string): string => `selib.execute_javascript(${str(body)})`;

export const pythonRobot: FrameworkProfile = {
  language: "python",
  framework: "robot",
  imports: ["from robot.libraries.BuiltIn import BuiltIn"],
  wrapper: {
    open: [
      "class RecordedTest:",
      '\t"""Keyword library replaying a recorded session."""',
      "",
      "\tdef run_recorded_test(self):",
    ],
    close: [],
    bodyDepth: 2,
  },
  setup: ['selib = BuiltIn().get_library_instance("SeleniumLibrary")'],
  teardown: [],
  locate: robotLocator,
  queries: {
    ...NO_QUERIES,
    text: (t) => `selib.get_text(${t.expr})`,
    attribute: (t, name) => `selib.get_element_attribute(${t.expr}, ${str(name)})`,
    property: (t, name) => `${element(t)}.get_property(${str(name)})`,
    visible: (t) => `${element(t)}.is_displayed()`,
    enabled: (t) => `${element(t)}.is_enabled()`,
    selected: (t) => `${element(t)}.is_selected()`,
    count: (t) => `selib.get_element_count(${t.expr})`,
    url: () => "selib.get_location()",
    title: () => "selib.get_title()",
    evaluate: (expression) => robotScript(`return ${expression}`),
    cookie: (name) => `selib.get_cookie(${str(name)}).value`,
    storage: (key) => robotScript(`return window.localStorage.getItem(${str(key)})`),
  },
  renderers: {
    CLICK: {
      click: (e, ctx) => withTarget(e.element, ctx, (t) => [`selib.click_element(${t.expr})`]),
      doubleClick: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [`selib.double_click_element(${t.expr})`]),
      rightClick: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [`selib.open_context_menu(${t.expr})`]),
    },
    INPUT: {
      type: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [
          `selib.input_text(${t.expr}, ${ctx.value(e.value)}, clear=${e.clearFirst === false ? "False" : "True"})`,
        ]),
      select: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [
          `selib.select_from_list_by_label(${t.expr}, ${ctx.value(e.value)})`,
        ]),
      upload: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [
          `selib.choose_file(${t.expr}, ${str((e.selectedFiles ?? []).join("\n"))})`,
        ]),
      check: (e, ctx) =>
        withTarget(e.element, ctx, (t) => [
          e.value?.trim().toLowerCase() === "false"
            ? `selib.unselect_checkbox(${t.expr})`
            : `selib.select_checkbox(${t.expr})`,
        ]),
    },
    NAVIGATION: {
      navigate: (e, ctx) => [`selib.go_to(${ctx.value(e.targetUrl)})`],
      back: () => ["selib.go_back()"],
      forward: () => [robotScript("history.forward()")],
      refresh: () => ["selib.reload_page()"],
    },
    ASSERTION: QUERY_ASSERTIONS,
    CAPTURE: QUERY_CAPTURES,
    CUSTOM_JS: {
      execute: (e, ctx) => {
        const method = e.async ? "execute_async_javascript" : "execute_javascript";
        return [bindScriptResult(`selib.${method}(${str(e.script)})`, e.returnVariables, ctx)];
      },
    },
  },
};
