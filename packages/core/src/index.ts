export * from "./checker/CheckWgsl.js";
export * from "./ExportRegistry.js";
export * from "./Expand.js";
export * from "./Fragment.js";
export * from "./HostTags.js";
export * from "./MatchWgsl.js";
export * from "./ModeSelector.js";
export * from "./Origin.js";
export * from "./ReferenceScanner.js";
export * from "./Renderer.js";
export * from "./ShaderBuild.js";
export * from "./Stitcher.js";
export * from "./StitchErrors.js";
export * from "./StitchLogging.js";
export * from "./TokenizeFragment.js";
export * from "./ValidatorAdapter.js";
