import type { RecordedEvent } from "../types/index.js";

/** Child lists of an event in render order; leaves have none */
export function childListsOf(event: RecordedEvent): RecordedEvent[][] {
  switch (event.type) {
    case "GROUP":
    case "LOOP":
      return [event.events];
    case "CONDITIONAL":
      return [event.thenEvents, event.elseEvents];
    case "TRY_CATCH":
      return [event.tryEvents, event.catchEvents, event.finallyEvents];
    default:
      return [];
  }
}

/**
 * Depth-first pre-order walk. The visitor gets each event with its depth
 * (0 for top level); returning false skips that event's children.
 */
export function walkEvents(
  events: readonly RecordedEvent[],
  visit: (event: RecordedEvent, depth: number) => boolean | void,
  depth = 0
): void {
  for (const event of events) {
    if (visit(event, depth) === false) {
      continue;
    }
    for (const children of childListsOf(event)) {
      walkEvents(children, visit, depth + 1);
    }
  }
}

/** Number of events in a forest, containers and descendants included */
export function countEvents(events: readonly RecordedEvent[]): number {
  let total = 0;
  walkEvents(events, () => {
    total++;
  });
  return total;
}

/** Find an event anywhere in the forest by id */
export function findEvent(
  events: readonly RecordedEvent[],
  id: string
): RecordedEvent | undefined {
  let found: RecordedEvent | undefined;
  walkEvents(events, (event) => {
    if (found) {
      return false;
    }
    if (event.id === id) {
      found = event;
      return false;
    }
    return true;
  });
  return found;
}
