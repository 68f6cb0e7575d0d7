/**
 * Parser for the serialized phrases column
 *
 * The column holds a list literal written either as JSON or in the
 * single-quoted dict/list notation of the export script, e.g.
 *   [{'phrase': 'Hunden skäller.', 'movie': 'movies/02/hund-00222-fras-1.mp4'}]
 *
 * Supported: lists, tuples, dicts, single/double-quoted strings with
 * backslash escapes, integers/floats, None/True/False and null/true/false.
 */

export class LiteralSyntaxError extends Error {
  constructor(message: string, position: number) {
    super(`${message} at position ${position}`);
    this.name = "LiteralSyntaxError";
  }
}

const SIMPLE_ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  b: "\b",
  f: "\f",
  "0": "\0",
  "\\": "\\",
  "'": "'",
  '"': '"',
  "/": "/",
};

const KEYWORDS: Record<string, null | boolean> = {
  None: null,
  null: null,
  True: true,
  true: true,
  False: false,
  false: false,
};

class LiteralParser {
  private pos = 0;

  constructor(private readonly text: string) {}

  parse(): unknown {
    const value = this.parseValue();
    this.skipWhitespace();
    if (this.pos < this.text.length) {
      throw new LiteralSyntaxError("Unexpected trailing input", this.pos);
    }
    return value;
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) {
      this.pos++;
    }
  }

  private peek(): string {
    this.skipWhitespace();
    return this.text[this.pos] ?? "";
  }

  private expect(char: string): void {
    if (this.peek() !== char) {
      throw new LiteralSyntaxError(`Expected "${char}"`, this.pos);
    }
    this.pos++;
  }

  private parseValue(): unknown {
    const char = this.peek();
    switch (char) {
      case "[":
        return this.parseSequence("[", "]");
      case "(":
        return this.parseSequence("(", ")");
      case "{":
        return this.parseDict();
      case "'":
      case '"':
        return this.parseString();
      case "":
        throw new LiteralSyntaxError("Unexpected end of input", this.pos);
      default:
        if (/[-+\d.]/.test(char)) {
          return this.parseNumber();
        }
        return this.parseKeyword();
    }
  }

  private parseSequence(open: string, close: string): unknown[] {
    this.expect(open);
    const items: unknown[] = [];
    while (this.peek() !== close) {
      items.push(this.parseValue());
      if (this.peek() === ",") {
        this.pos++;
      } else if (this.peek() !== close) {
        throw new LiteralSyntaxError(`Expected "," or "${close}"`, this.pos);
      }
    }
    this.pos++;
    return items;
  }

  private parseDict(): Record<string, unknown> {
    this.expect("{");
    const dict: Record<string, unknown> = {};
    while (this.peek() !== "}") {
      const key = this.parseValue();
      if (typeof key !== "string" && typeof key !== "number") {
        throw new LiteralSyntaxError("Unsupported dict key", this.pos);
      }
      this.expect(":");
      dict[String(key)] = this.parseValue();
      if (this.peek() === ",") {
        this.pos++;
      } else if (this.peek() !== "}") {
        throw new LiteralSyntaxError('Expected "," or "}"', this.pos);
      }
    }
    this.pos++;
    return dict;
  }

  private parseString(): string {
    const quote = this.text[this.pos];
    this.pos++;
    let result = "";

    while (this.pos < this.text.length) {
      const char = this.text[this.pos];
      if (char === quote) {
        this.pos++;
        return result;
      }
      if (char !== "\\") {
        result += char;
        this.pos++;
        continue;
      }

      const next = this.text[this.pos + 1] ?? "";
      if (next === "x" || next === "u") {
        const length = next === "x" ? 2 : 4;
        const hex = this.text.slice(this.pos + 2, this.pos + 2 + length);
        if (!new RegExp(`^[0-9a-fA-F]{${length}}$`).test(hex)) {
          throw new LiteralSyntaxError("Invalid escape", this.pos);
        }
        result += String.fromCharCode(parseInt(hex, 16));
        this.pos += 2 + length;
      } else if (Object.prototype.hasOwnProperty.call(SIMPLE_ESCAPES, next)) {
        result += SIMPLE_ESCAPES[next];
        this.pos += 2;
      } else {
        // Unknown escapes are kept as written
        result += char + next;
        this.pos += 2;
      }
    }

    throw new LiteralSyntaxError("Unterminated string", this.pos);
  }

  private parseNumber(): number {
    const match = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?/.exec(this.text.slice(this.pos));
    if (!match) {
      throw new LiteralSyntaxError("Invalid number", this.pos);
    }
    this.pos += match[0].length;
    return Number(match[0]);
  }

  private parseKeyword(): null | boolean {
    const match = /^[A-Za-z_]\w*/.exec(this.text.slice(this.pos));
    if (!match || !Object.prototype.hasOwnProperty.call(KEYWORDS, match[0])) {
      throw new LiteralSyntaxError("Unexpected token", this.pos);
    }
    this.pos += match[0].length;
    return KEYWORDS[match[0]];
  }
}

/**
 * Parse a serialized literal
 *
 * @throws {LiteralSyntaxError} On malformed input
 */
export function parseLiteral(text: string): unknown {
  return new LiteralParser(text).parse();
}
