/** specify a start,end portion of a string to be replaced */
export interface SliceReplace {
  start: number;
  end: number;
  replacement: string;
}

/**
 * Rewrite a string by replacing non overlapping segments with provided texts.
 *
 * example:
 * src:
 *  aaabbbbbc
 *     ^    ^
 *     St   End Repl='XXX'
 *
 * returns:
 *  aaaXXXc
 */
export function sliceReplace(src: string, slices: SliceReplace[]): string {
  const sorted = [...slices].sort((a, b) => a.start - b.start);
  const results: string[] = [];
  let srcPos = 0;
  for (const { start, end, replacement } of sorted) {
    results.push(src.slice(srcPos, start), replacement);
    srcPos = end;
  }
  results.push(src.slice(srcPos));
  return results.join("");
}
