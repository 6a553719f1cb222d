// Finds the offset of the first JSON syntax error. JSON.parse only reports a
// position for some errors, so malformed input is re-scanned here.

class SyntaxStop {
  public constructor(public readonly offset: number) {}
}

const HEX = /^[0-9a-fA-F]$/;

class Scanner {
  private i = 0;

  public constructor(private readonly text: string) {}

  public run(): void {
    this.ws();
    this.value();
    this.ws();
    if (this.i < this.text.length) this.stop();
  }

  private stop(at = this.i): never {
    throw new SyntaxStop(at);
  }

  private peek(): string {
    return this.text.charAt(this.i);
  }

  private ws(): void {
    while (this.i < this.text.length) {
      const c = this.peek();
      if (c !== " " && c !== "\t" && c !== "\n" && c !== "\r") return;
      this.i++;
    }
  }

  private value(): void {
    const c = this.peek();
    if (c === "{") this.object();
    else if (c === "[") this.array();
    else if (c === '"') this.string();
    else if (c === "-" || (c >= "0" && c <= "9")) this.number();
    else if (c === "t") this.literal("true");
    else if (c === "f") this.literal("false");
    else if (c === "n") this.literal("null");
    else this.stop();
  }

  private object(): void {
    this.i++;
    this.ws();
    if (this.peek() === "}") {
      this.i++;
      return;
    }
    for (;;) {
      if (this.peek() !== '"') this.stop();
      this.string();
      this.ws();
      if (this.peek() !== ":") this.stop();
      this.i++;
      this.ws();
      this.value();
      this.ws();
      const c = this.peek();
      this.i++;
      if (c === "}") return;
      if (c !== ",") this.stop(this.i - 1);
      this.ws();
    }
  }

  private array(): void {
    this.i++;
    this.ws();
    if (this.peek() === "]") {
      this.i++;
      return;
    }
    for (;;) {
      this.value();
      this.ws();
      const c = this.peek();
      this.i++;
      if (c === "]") return;
      if (c !== ",") this.stop(this.i - 1);
      this.ws();
    }
  }

  private string(): void {
    this.i++;
    for (;;) {
      if (this.i >= this.text.length) this.stop();
      const c = this.peek();
      if (c === '"') {
        this.i++;
        return;
      }
      if (c === "\\") {
        this.i++;
        const e = this.peek();
        if (e === "u") {
          for (let k = 1; k <= 4; k++) {
            if (!HEX.test(this.text.charAt(this.i + k))) this.stop(this.i + k);
          }
          this.i += 5;
        } else if (e !== "" && '"\\/bfnrt'.includes(e)) {
          this.i++;
        } else {
          this.stop();
        }
        continue;
      }
      if (c.charCodeAt(0) < 0x20) this.stop();
      this.i++;
    }
  }

  private digits(): void {
    const start = this.i;
    while (this.peek() >= "0" && this.peek() <= "9") this.i++;
    if (this.i === start) this.stop();
  }

  private number(): void {
    if (this.peek() === "-") this.i++;
    if (this.peek() === "0") this.i++;
    else this.digits();
    if (this.peek() === ".") {
      this.i++;
      this.digits();
    }
    if (this.peek() === "e" || this.peek() === "E") {
      this.i++;
      if (this.peek() === "+" || this.peek() === "-") this.i++;
      this.digits();
    }
  }

  private literal(word: string): void {
    for (const ch of word) {
      if (this.peek() !== ch) this.stop();
      this.i++;
    }
  }
}

/**
 * Offset of the first character that makes `text` invalid JSON (`text.length`
 * for unexpected end of input), or undefined when the scan finds no error.
 */
export function locateJsonSyntaxError(text: string): number | undefined {
  try {
    new Scanner(text).run();
    return undefined;
  } catch (e: unknown) {
    if (e instanceof SyntaxStop) return e.offset;
    // Nesting deep enough to exhaust the stack.
    if (e instanceof RangeError) return undefined;
    throw e;
  }
}
