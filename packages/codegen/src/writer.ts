/**
 * Line-oriented source writer with indentation tracking.
 */

const LEADING_TABS = /^\t+/;

export class CodeWriter {
  private readonly lines: string[] = [];
  private depth = 0;
  private statements = 0;

  constructor(
    private readonly indentUnit: string,
    private readonly commentLine: (text: string) => string
  ) {}

  /** Number of executable lines written so far */
  get statementCount(): number {
    return this.statements;
  }

  setDepth(depth: number): void {
    this.depth = Math.max(depth, 0);
  }

  indent(): void {
    this.depth += 1;
  }

  dedent(): void {
    this.depth = Math.max(this.depth - 1, 0);
  }

  statement(text: string): void {
    this.lines.push(this.prefix() + text);
    this.statements += 1;
  }

  /** Block punctuation such as `} else {`; not counted as a statement */
  structural(text: string): void {
    this.lines.push(this.prefix() + text);
  }

  comment(text: string): void {
    this.lines.push(this.prefix() + this.commentLine(text.replace(/[\r\n\u2028\u2029]+/g, " ")));
  }

  /** Line at column zero; leading tabs become indent units */
  raw(text: string): void {
    this.lines.push(
      text.replace(LEADING_TABS, (tabs) => this.indentUnit.repeat(tabs.length))
    );
  }

  blank(): void {
    this.lines.push("");
  }

  toLines(): string[] {
    return [...this.lines];
  }

  private prefix(): string {
    return this.indentUnit.repeat(this.depth);
  }
}

/**
 * Trim trailing whitespace, collapse blank-line runs, drop leading and
 * trailing blank lines, end with exactly one newline.
 */
export function prettify(lines: string[]): string {
  const out: string[] = [];
  for (const line of lines) {
    const trimmed = line.trimEnd();
    if (trimmed === "" && (out.length === 0 || out[out.length - 1] === "")) {
      continue;
    }
    out.push(trimmed);
  }
  while (out.length > 0 && out[out.length - 1] === "") {
    out.pop();
  }
  return `${out.join("\n")}\n`;
}
