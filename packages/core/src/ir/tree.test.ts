import { describe, it, expect } from "vitest";
import type { RecordedEvent } from "../types/index.js";
import { countEvents, findEvent, walkEvents } from "./tree.js";

const base = { timestamp: 1700000000000, url: "https://shop.test/" };

function click(id: string): RecordedEvent {
  return { ...base, id, type: "CLICK", element: { tagName: "a", id } };
}

const forest: RecordedEvent[] = [
  click("1"),
  {
    ...base,
    id: "2",
    type: "TRY_CATCH",
    tryEvents: [click("2.1")],
    catchEvents: [
      {
        ...base,
        id: "2.2",
        type: "GROUP",
        name: "recover",
        events: [click("2.2.1")],
      },
    ],
    finallyEvents: [click("2.3")],
    errorVariable: "e",
  },
  click("3"),
];

describe("walkEvents", () => {
  it("visits depth-first in list order", () => {
    const seen: string[] = [];
    walkEvents(forest, (event, depth) => {
      seen.push(`${event.id}@${depth}`);
    });
    expect(seen).toEqual(["1@0", "2@0", "2.1@1", "2.2@1", "2.2.1@2", "2.3@1", "3@0"]);
  });

  it("skips children when the visitor returns false", () => {
    const seen: string[] = [];
    walkEvents(forest, (event) => {
      seen.push(event.id);
      return event.type !== "TRY_CATCH";
    });
    expect(seen).toEqual(["1", "2", "3"]);
  });
});

describe("countEvents", () => {
  it("counts containers and descendants", () => {
    expect(countEvents(forest)).toBe(7);
  });
});

describe("findEvent", () => {
  it("finds nested events", () => {
    expect(findEvent(forest, "2.2.1")?.type).toBe("CLICK");
  });

  it("returns undefined for unknown ids", () => {
    expect(findEvent(forest, "9")).toBeUndefined();
  });
});
