export * from "./deriveInsights";
export * from "./round";
export * from "./signal";
export * from "./stats";
