import { wgsl, wgslExport } from "@wgsl-stitch/core";

export const lighting = wgslExport(
  "lambert",
  wgsl`fn lambert(n: vec3<f32>, l: vec3<f32>) -> f32 { return max(dot(n, l), 0.0); }`
);
