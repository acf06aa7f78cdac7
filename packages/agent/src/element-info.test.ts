// @vitest-environment jsdom
import { describe, it, expect, beforeEach } from "vitest";
import { cssSelector, elementInfo, xpath } from "./element-info.js";

function query(selector: string): Element {
  const element = document.querySelector(selector);
  if (!element) {
    throw new Error(`missing ${selector}`);
  }
  return element;
}

describe("cssSelector and xpath", () => {
  beforeEach(() => {
    document.body.innerHTML = `
      <form id="login">
        <input name="user"><input name="user">
        <button class="btn primary">Sign in</button>
      </form>
      <div></div>
      <div><span>hello</span></div>`;
  });

  it("prefers the id", () => {
    expect(cssSelector(query("#login"))).toBe("#login");
    expect(xpath(query("#login"))).toBe('//*[@id="login"]');
  });

  it("uses tag and classes when they are unique", () => {
    expect(cssSelector(query("button"))).toBe("button.btn.primary");
  });

  it("falls back to a positional step under an anchored parent", () => {
    const second = query("input:nth-of-type(2)");
    expect(cssSelector(second)).toBe('#login > input[name="user"]:nth-child(2)');
    expect(xpath(second)).toBe('//*[@id="login"]/input[2]');
  });

  it("builds an absolute path when no ancestor has an id", () => {
    const span = query("span");
    expect(xpath(span)).toBe("/html/body/div[2]/span");
    expect(cssSelector(span)).toBe("div > span:nth-child(1)");
  });
});

describe("elementInfo", () => {
  it("snapshots a form field", () => {
    document.body.innerHTML =
      '<input id="email" type="email" placeholder="you@example.test" value="a@b.test">';

    expect(elementInfo(query("#email"))).toEqual({
      tagName: "input",
      id: "email",
      type: "email",
      value: "a@b.test",
      cssSelector: "#email",
      xpath: '//*[@id="email"]',
      placeholder: "you@example.test",
      attributes: {
        id: "email",
        type: "email",
        placeholder: "you@example.test",
        value: "a@b.test",
      },
      boundingRect: { x: 0, y: 0, width: 0, height: 0 },
    });
  });

  it("keeps link targets and trimmed text", () => {
    document.body.innerHTML = '<a href="/cart" class="nav">  Cart  </a>';
    const info = elementInfo(query("a"));
    expect(info.href).toBe("/cart");
    expect(info.text).toBe("Cart");
    expect(info.className).toBe("nav");
    expect(info.value).toBeUndefined();
  });

  it("limits text to one hundred characters", () => {
    document.body.innerHTML = `<p>${"x".repeat(150)}</p>`;
    expect(elementInfo(query("p")).text).toHaveLength(100);
  });
});
