export * from "./types";
export * from "./snapshotAggregator";
export * from "./serializer";
