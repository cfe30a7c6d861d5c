/**
 * Tags for marking wgsl in host source.
 *
 * The wgsl-stitch cli replaces tagged fragments with their expanded text,
 * so at run time these only see source that wasn't expanded.
 */

/** marks a wgsl fragment: wgsl`fn f() -> f32 { return 1.0; }` */
export function wgsl(strings: TemplateStringsArray, ...values: unknown[]): string {
  return String.raw(strings, ...values);
}

/** marks a wgsl fragment exported for use by other fragments as #name */
export function wgslExport(name: string, text: string): string {
  return text;
}
