export * from "./types";
export * from "./linalg";
export * from "./intervals";
export * from "./baseForecaster";
export * from "./linearTrend";
export * from "./ar4";
export * from "./holt";
export * from "./createForecaster";
