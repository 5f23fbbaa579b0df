import type { RewardComponent } from "../types.js";
import { NUMBER_LITERAL } from "./grammar.js";

export class RewardLiteralError extends Error {
  readonly position: number;

  constructor(message: string, position: number) {
    super(`${message} at offset ${position}`);
    this.name = "RewardLiteralError";
    this.position = position;
  }
}

const SIMPLE_ESCAPES: Record<string, string> = {
  "\\": "\\",
  "'": "'",
  '"': '"',
  n: "\n",
  r: "\r",
  t: "\t",
};

/**
 * Decodes a flat `{'name': number, ...}` literal. Keys may use single or
 * double quotes (so both the quoted-literal style and JSON are accepted);
 * values must be finite numbers. Source order is kept.
 */
export function parseRewardLiteral(input: string): RewardComponent[] {
  const scanner = new LiteralScanner(input);
  const entries = scanner.readObject();
  scanner.skipWhitespace();
  if (!scanner.atEnd()) {
    throw new RewardLiteralError("Unexpected trailing text", scanner.position);
  }
  return entries;
}

class LiteralScanner {
  position = 0;

  constructor(private readonly text: string) {}

  atEnd(): boolean {
    return this.position >= this.text.length;
  }

  skipWhitespace(): void {
    while (!this.atEnd() && /\s/.test(this.text[this.position])) {
      this.position += 1;
    }
  }

  readObject(): RewardComponent[] {
    this.skipWhitespace();
    this.expect("{");
    const entries: RewardComponent[] = [];
    const seen = new Set<string>();

    this.skipWhitespace();
    if (this.peek() === "}") {
      this.position += 1;
      return entries;
    }

    for (;;) {
      this.skipWhitespace();
      const keyAt = this.position;
      const name = this.readString();
      if (seen.has(name)) {
        throw new RewardLiteralError(`Duplicate key '${name}'`, keyAt);
      }
      seen.add(name);
      this.skipWhitespace();
      this.expect(":");
      this.skipWhitespace();
      entries.push({ name, value: this.readNumber() });
      this.skipWhitespace();

      const next = this.peek();
      if (next === ",") {
        this.position += 1;
        continue;
      }
      if (next === "}") {
        this.position += 1;
        return entries;
      }
      throw new RewardLiteralError(
        next === undefined ? "Unbalanced braces" : `Expected ',' or '}' but found '${next}'`,
        this.position,
      );
    }
  }

  private readString(): string {
    const quote = this.peek();
    if (quote !== "'" && quote !== '"') {
      throw new RewardLiteralError("Expected a quoted key", this.position);
    }
    const openedAt = this.position;
    this.position += 1;
    let out = "";
    while (!this.atEnd()) {
      const ch = this.text[this.position];
      if (ch === quote) {
        this.position += 1;
        return out;
      }
      if (ch === "\\") {
        out += this.readEscape();
        continue;
      }
      out += ch;
      this.position += 1;
    }
    throw new RewardLiteralError("Unterminated string", openedAt);
  }

  private readEscape(): string {
    const at = this.position;
    const code = this.text[at + 1];
    if (code === undefined) {
      throw new RewardLiteralError("Dangling escape", at);
    }
    const simple = SIMPLE_ESCAPES[code];
    if (simple !== undefined) {
      this.position += 2;
      return simple;
    }
    const width = code === "x" ? 2 : code === "u" ? 4 : 0;
    const hex = this.text.slice(at + 2, at + 2 + width);
    if (width === 0 || !new RegExp(`^[0-9a-fA-F]{${width}}$`).test(hex)) {
      throw new RewardLiteralError(`Invalid escape '\\${code}'`, at);
    }
    this.position += 2 + width;
    return String.fromCharCode(Number.parseInt(hex, 16));
  }

  private readNumber(): number {
    const match = this.text.slice(this.position).match(NUMBER_LITERAL);
    if (!match) {
      throw new RewardLiteralError("Expected a numeric value", this.position);
    }
    const value = Number(match[0]);
    if (!Number.isFinite(value)) {
      throw new RewardLiteralError(`Value '${match[0]}' is not finite`, this.position);
    }
    this.position += match[0].length;
    return value;
  }

  private expect(ch: string): void {
    if (this.peek() !== ch) {
      throw new RewardLiteralError(`Expected '${ch}'`, this.position);
    }
    this.position += 1;
  }

  private peek(): string | undefined {
    return this.text[this.position];
  }
}
