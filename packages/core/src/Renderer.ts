import { srcLine } from "mini-parse";
import { Token, isIdentifier } from "./Fragment.js";
import { OriginRef, definitionPosition } from "./Origin.js";
import { StitchedModule } from "./Stitcher.js";

/** a range of rendered text and the origin of the token that produced it */
export interface OriginRange {
  start: number;
  /** exclusive */
  end: number;
  origin: OriginRef;
}

/** sorted, contiguous ranges covering the whole rendered text */
export class ByteRangeOriginTable {
  constructor(readonly entries: readonly OriginRange[]) {}

  /** @return the range containing offset. Offsets past the end map to the last range. */
  originAt(offset: number): OriginRange | undefined {
    const { entries } = this;
    if (!entries.length || offset < 0) return undefined;

    let lo = 0;
    let hi = entries.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (entries[mid].start <= offset) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return entries[lo];
  }
}

export interface Rendered {
  text: string;
  table: ByteRangeOriginTable;
}

/** render the imports and then the root of a stitched module */
export function renderStitched(module: StitchedModule): Rendered {
  const writer = new RenderWriter();
  for (const f of [...module.imports, module.root]) {
    writer.breakLine();
    f.tokens.forEach((t) => writer.write(t));
  }
  return writer.finish();
}

export function renderTokens(tokens: readonly Token[]): Rendered {
  const writer = new RenderWriter();
  tokens.forEach((t) => writer.write(t));
  return writer.finish();
}

const lineAfter = new Set([";", "{", "}"]);
const noSpaceAfter = new Set([".", ":", "::", "@", "#", "(", "["]);
const trimBefore = new Set([")", "]", "}", ",", ".", ":", "::", ";"]);
const openBrackets = new Set(["(", "["]);
const callable = new Set([">", ")", "]"]);

/**
 * Concatenate token text with the whitespace wgsl needs to lex the same tokens,
 * recording where each token starts.
 *
 * Every token is followed by a space, except:
 *  line breaks follow ';' '{' and '}',
 *  nothing follows '.' ':' '::' '@' '#' '(' and '['.
 * A '>' stays joined to a '>' it touches in the source, so shifts stay shifts.
 * A line break precedes '#', and a #directive line ends
 * where the next token starts on a later source line.
 * Within a directive line braces and ';' don't break the line.
 */
class RenderWriter {
  private text = "";
  private starts: number[] = [];
  private origins: OriginRef[] = [];
  private prev: Token | undefined;
  private directiveLine = false;

  write(token: Token): void {
    const { text } = token;
    const { prev } = this;

    if (this.directiveLine && prev && laterLine(prev, token)) {
      this.breakLine();
    }
    if (
      trimBefore.has(text) ||
      (openBrackets.has(text) && prev && opensCall(prev)) ||
      (prev && joinedShift(prev, token))
    ) {
      this.trimSpace();
    }
    if (text === "#") {
      this.breakLine();
      this.directiveLine = true;
    }

    this.starts.push(this.text.length);
    this.origins.push(token.origin);
    this.text += text;

    if (this.directiveLine) {
      if (!noSpaceAfter.has(text) && text !== "{") this.text += " ";
    } else if (lineAfter.has(text)) {
      this.text += "\n";
    } else if (!noSpaceAfter.has(text)) {
      this.text += " ";
    }
    this.prev = token;
  }

  /** end the current line, unless already at a line start */
  breakLine(): void {
    this.trimSpace();
    if (this.text && !this.text.endsWith("\n")) {
      this.text += "\n";
    }
    this.directiveLine = false;
  }

  finish(): Rendered {
    this.trimSpace();
    const { starts, origins } = this;
    const entries = starts.map((start, i) => {
      const end = starts[i + 1] ?? this.text.length;
      return { start, end, origin: origins[i] };
    });
    return { text: this.text, table: new ByteRangeOriginTable(entries) };
  }

  private trimSpace(): void {
    if (this.text.endsWith(" ")) {
      this.text = this.text.slice(0, -1);
    }
  }
}

function opensCall(prev: Token): boolean {
  return isIdentifier(prev.text) || callable.has(prev.text);
}

/** '>' '>' with nothing between them in the source */
function joinedShift(prev: Token, next: Token): boolean {
  if (prev.text !== ">" || next.text !== ">") return false;
  const a = definitionPosition(prev.origin);
  const b = definitionPosition(next.origin);
  return a.src === b.src && b.offset === a.offset + 1;
}

function laterLine(prev: Token, next: Token): boolean {
  const a = definitionPosition(prev.origin);
  const b = definitionPosition(next.origin);
  if (a.src !== b.src) return true;
  return lineOf(b.src.text, b.offset) > lineOf(a.src.text, a.offset);
}

function lineOf(text: string, offset: number): number {
  return srcLine(text, offset).lineNum;
}
