export * from "./attributes.js";
export * from "./boundary.js";
export * from "./calendar.js";
export * from "./core.js";
export * from "./element.js";
export * from "./errors.js";
export * from "./formatContext.js";
export type * from "./formatProcessor.js";
export * from "./interval.js";
export * from "./intervalFactory.js";
export * from "./parseLog.js";
export * from "./pivotYear.js";
export * from "./pivotYearCodec.js";
export * from "./timeline.js";
