/**
 * Plain-text output for the CLI.
 */

import {
  describeEvent,
  validationErrors,
  type RecordedEvent,
  type SessionSummary,
} from "@testcast/core";

interface Branch {
  label: string | null;
  events: RecordedEvent[];
}

function branchesOf(event: RecordedEvent): Branch[] {
  switch (event.type) {
    case "GROUP":
    case "LOOP":
      return [{ label: null, events: event.events }];
    case "CONDITIONAL":
      return [
        { label: "then", events: event.thenEvents },
        { label: "else", events: event.elseEvents },
      ];
    case "TRY_CATCH":
      return [
        { label: "try", events: event.tryEvents },
        { label: "catch", events: event.catchEvents },
        { label: "finally", events: event.finallyEvents },
      ];
    default:
      return [];
  }
}

function eventLine(event: RecordedEvent, number: string, indent: string): string {
  let line = `${indent}${number}. ${describeEvent(event)}`;
  if (event.disabled) {
    line += " [disabled]";
  }
  const errors = validationErrors(event);
  if (errors.length > 0) {
    line += ` [invalid: ${errors.join("; ")}]`;
  }
  return line;
}

/**
 * One line per event, indented two spaces per level and numbered like the
 * step comments in generated code (`2`, `2.1`, `2.2`). Numbering runs on
 * across the branches of a conditional or try/catch; empty branches are
 * left out.
 */
export function describeTree(events: readonly RecordedEvent[]): string[] {
  const lines: string[] = [];

  const visit = (list: readonly RecordedEvent[], prefix: string, depth: number) => {
    const indent = "  ".repeat(depth);
    list.forEach((event, index) => {
      const number = prefix === "" ? String(index + 1) : `${prefix}.${index + 1}`;
      lines.push(eventLine(event, number, indent));
      visitBranches(event, number, depth + 1);
    });
  };

  const visitBranches = (event: RecordedEvent, number: string, depth: number) => {
    let counter = 0;
    for (const branch of branchesOf(event)) {
      if (branch.events.length === 0) {
        continue;
      }
      let childDepth = depth;
      if (branch.label !== null) {
        lines.push(`${"  ".repeat(depth)}${branch.label}:`);
        childDepth = depth + 1;
      }
      const indent = "  ".repeat(childDepth);
      for (const child of branch.events) {
        counter += 1;
        const childNumber = `${number}.${counter}`;
        lines.push(eventLine(child, childNumber, indent));
        visitBranches(child, childNumber, childDepth + 1);
      }
    }
  };

  visit(events, "", 0);
  return lines;
}

export function formatSessionTable(sessions: readonly SessionSummary[]): string[] {
  if (sessions.length === 0) {
    return ["No sessions found."];
  }

  const lines = [
    "ID".padEnd(38) + "NAME".padEnd(20) + "STATUS".padEnd(11) + "STARTED".padEnd(26) + "EVENTS",
    "-".repeat(100),
  ];
  for (const session of sessions) {
    const name =
      session.name.length > 18 ? `${session.name.slice(0, 17)}…` : session.name;
    lines.push(
      session.id.padEnd(38) +
        name.padEnd(20) +
        session.status.padEnd(11) +
        session.startTime.padEnd(26) +
        String(session.eventCount)
    );
  }
  return lines;
}
