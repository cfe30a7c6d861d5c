import { Fragment } from "../Fragment.js";
import { hostSource } from "../Origin.js";
import { fragmentFromText } from "../TokenizeFragment.js";

/** create a fragment from wgsl text in its own host file (named for the export, or root.wgsl) */
export function textFragment(text: string, name?: string): Fragment {
  const src = hostSource(`${name ?? "root"}.wgsl`, text);
  return fragmentFromText(src, { name });
}

/** token texts of a fragment */
export function tokenTexts(fragment: { tokens: readonly { text: string }[] }): string[] {
  return fragment.tokens.map((t) => t.text);
}
