/**
 * Java profiles: Selenium WebDriver, Appium and REST Assured, all on JUnit 5.
 */

import type { Locator } from "@testcast/core";
import { NO_QUERIES } from "../context.js";
import type {
  FrameworkProfile,
  PageQueries,
  RendererTable,
  Target,
} from "../context.js";
import { QUERY_ASSERTIONS, QUERY_CAPTURES } from "../queries.js";
import { ariaSelector, bindScriptResult, str, withTarget } from "./shared.js";

const COMMON_IMPORTS = [
  "import java.util.List;",
  "import java.util.Map;",
  "import java.util.Objects;",
  "import org.junit.jupiter.api.Test;",
];

const SELENIUM_IMPORTS = [
  "import org.openqa.selenium.By;",
  "import org.openqa.selenium.JavascriptExecutor;",
  "import org.openqa.selenium.interactions.Actions;",
  "import org.openqa.selenium.support.ui.Select;",
];

const STATIC_IMPORTS = [
  "",
  "import static org.junit.jupiter.api.Assertions.assertTrue;",
];

function byLocator(locator: Locator): string {
  const v = str(locator.value);
  switch (locator.strategy) {
    case "CSS":
      return `By.cssSelector(${v})`;
    case "ID":
      return `By.id(${v})`;
    case "NAME":
      return `By.name(${v})`;
    case "TAG":
      return `By.tagName(${v})`;
    case "CLASS":
      return `By.className(${v})`;
    case "LINK_TEXT":
      return `By.linkText(${v})`;
    case "PARTIAL_LINK_TEXT":
      return `By.partialLinkText(${v})`;
    case "ACCESSIBILITY_ID":
      return `By.cssSelector(${str(ariaSelector(locator.value))})`;
    default:
      return `By.xpath(${v})`;
  }
}

const find = (target: Target): string => `driver.findElement(${target.expr})`;
const script = (body: string): string =>
  `((JavascriptExecutor) driver).executeScript(${str(body)})`;

const WEBDRIVER_QUERIES: PageQueries = {
  ...NO_QUERIES,
  text: (t) => `${find(t)}.getText()`,
  attribute: (t, name) => `${find(t)}.getAttribute(${str(name)})`,
  property: (t, name) => `${find(t)}.getDomProperty(${str(name)})`,
  visible: (t) => `${find(t)}.isDisplayed()`,
  enabled: (t) => `${find(t)}.isEnabled()`,
  selected: (t) => `${find(t)}.isSelected()`,
  count: (t) => `driver.findElements(${t.expr}).size()`,
  url: () => "driver.getCurrentUrl()",
  title: () => "driver.getTitle()",
  evaluate: (expression) => script(`return ${expression}`),
  cookie: (name) => `driver.manage().getCookieNamed(${str(name)}).getValue()`,
  storage: (key) =>
    script(`return window.localStorage.getItem(${str(key)})`),
};

const WEBDRIVER_RENDERERS: RendererTable = {
  CLICK: {
    click: (e, ctx) => withTarget(e.element, ctx, (t) => [`${find(t)}.click();`]),
    doubleClick: (e, ctx) =>
      withTarget(e.element, ctx, (t) => [
        `new Actions(driver).doubleClick(${find(t)}).perform();`,
      ]),
    rightClick: (e, ctx) =>
      withTarget(e.element, ctx, (t) => [
        `new Actions(driver).contextClick(${find(t)}).perform();`,
      ]),
  },
  INPUT: {
    type: (e, ctx) =>
      withTarget(e.element, ctx, (t) => [
        ...(e.clearFirst ? [`${find(t)}.clear();`] : []),
        `${find(t)}.sendKeys(${ctx.value(e.value)});`,
      ]),
    select: (e, ctx) =>
      withTarget(e.element, ctx, (t) => [
        `new Select(${find(t)}).selectByVisibleText(${ctx.value(e.value)});`,
      ]),
    upload: (e, ctx) =>
      withTarget(e.element, ctx, (t) => [
        `${find(t)}.sendKeys(${ctx.str((e.selectedFiles ?? []).join("\n"))});`,
      ]),
    check: (e, ctx) => withTarget(e.element, ctx, (t) => [`${find(t)}.click();`]),
  },
  NAVIGATION: {
    navigate: (e, ctx) => [`driver.get(${ctx.value(e.targetUrl)});`],
    back: () => ["driver.navigate().back();"],
    forward: () => ["driver.navigate().forward();"],
    refresh: () => ["driver.navigate().refresh();"],
  },
  ASSERTION: QUERY_ASSERTIONS,
  CAPTURE: QUERY_CAPTURES,
  CUSTOM_JS: {
    execute: (e, ctx) => {
      const args = [ctx.str(e.script)];
      if (e.useElementContext) {
        const target = ctx.target(e.contextElement);
        if (!target) return null;
        args.push(find(target));
      }
      const method = e.async ? "executeAsyncScript" : "executeScript";
      const call = `((JavascriptExecutor) driver).${method}(${args.join(", ")})`;
      return [bindScriptResult(call, e.returnVariables, ctx)];
    },
  },
};

export const javaSelenium: FrameworkProfile = {
  language: "java",
  framework: "selenium",
  imports: [
    ...COMMON_IMPORTS,
    ...SELENIUM_IMPORTS,
    "import org.openqa.selenium.WebDriver;",
    "import org.openqa.selenium.chrome.ChromeDriver;",
    ...STATIC_IMPORTS,
  ],
  setup: ["WebDriver driver = new ChromeDriver();"],
  teardown: ["driver.quit();"],
  locate: byLocator,
  queries: WEBDRIVER_QUERIES,
  renderers: WEBDRIVER_RENDERERS,
};

export const javaAppium: FrameworkProfile = {
  language: "java",
  framework: "appium",
  imports: [
    "import io.appium.java_client.AppiumBy;",
    "import io.appium.java_client.android.AndroidDriver;",
    "import io.appium.java_client.android.options.UiAutomator2Options;",
    "import java.net.URL;",
    ...COMMON_IMPORTS,
    ...SELENIUM_IMPORTS,
    ...STATIC_IMPORTS,
  ],
  setup: [
    'AndroidDriver driver = new AndroidDriver(new URL("http://127.0.0.1:4723"), new UiAutomator2Options());',
  ],
  teardown: ["driver.quit();"],
  locate: (locator) =>
    locator.strategy === "ACCESSIBILITY_ID"
      ? `AppiumBy.accessibilityId(${str(locator.value)})`
      : byLocator(locator),
  queries: WEBDRIVER_QUERIES,
  renderers: WEBDRIVER_RENDERERS,
};

export const javaRestAssured: FrameworkProfile = {
  language: "java",
  framework: "rest-assured",
  imports: [
    "import io.restassured.RestAssured;",
    "import io.restassured.response.Response;",
    ...COMMON_IMPORTS,
    ...STATIC_IMPORTS,
  ],
  setup: [],
  teardown: [],
  locate: (locator) => str(locator.value),
  queries: {
    ...NO_QUERIES,
    response: (method, expression) => {
      if (method === "JSON_PATH") {
        return `response.jsonPath().getString(${str(expression)})`;
      }
      if (method === "XPATH") {
        return `response.xmlPath().getString(${str(expression)})`;
      }
      return null;
    },
  },
  renderers: {
    NAVIGATION: {
      navigate: (e, c) => [
        c.assign("response", `RestAssured.get(${c.value(e.targetUrl)})`, "OBJECT", "Response"),
      ],
    },
    CAPTURE: { RESPONSE: QUERY_CAPTURES.RESPONSE },
  },
};

