import type { Language } from "@testcast/core";
import type { FrameworkProfile } from "../context.js";
import { str } from "./shared.js";
import { csharpPlaywright, csharpSelenium, csharpSpecflow } from "./csharp.js";
import { javaAppium, javaRestAssured, javaSelenium } from "./java.js";
import {
  javascriptCypress,
  javascriptPlaywright,
  javascriptWebdriverio,
} from "./javascript.js";
import { pythonPytest, pythonRobot, pythonSelenium } from "./python.js";

const PROFILES: readonly FrameworkProfile[] = [
  javaSelenium,
  javaAppium,
  javaRestAssured,
  javascriptPlaywright,
  javascriptCypress,
  javascriptWebdriverio,
  pythonSelenium,
  pythonPytest,
  pythonRobot,
  csharpSelenium,
  csharpPlaywright,
  csharpSpecflow,
];

/** Framework names supported for a language, in registry order */
export function frameworksFor(language: Language): string[] {
  return PROFILES.filter((p) => p.language === language).map((p) => p.framework);
}

export function findProfile(
  language: Language,
  framework: string
): FrameworkProfile | undefined {
  const name = framework.trim().toLowerCase();
  return PROFILES.find((p) => p.language === language && p.framework === name);
}

/**
 * Profile for a framework nobody registered: the language scaffold with
 * an empty renderer table, so every leaf renders as unsupported.
 */
export function scaffoldProfile(language: Language, framework: string): FrameworkProfile {
  return {
    language,
    framework,
    imports: [],
    setup: [],
    teardown: [],
    locate: (locator) => str(locator.value),
    renderers: {},
  };
}
