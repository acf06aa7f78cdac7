import type { VariableType } from "@testcast/core";

/** Nested name scopes of a generated script */
export class VariableScope {
  private readonly frames: Map<string, VariableType>[] = [new Map()];

  push(): void {
    this.frames.push(new Map());
  }

  pop(): void {
    if (this.frames.length > 1) {
      this.frames.pop();
    }
  }

  declare(name: string, type: VariableType): void {
    this.frames[this.frames.length - 1]?.set(name, type);
  }

  lookup(name: string): VariableType | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const type = this.frames[i]?.get(name);
      if (type !== undefined) {
        return type;
      }
    }
    return undefined;
  }
}
