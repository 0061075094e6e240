export * from "./context";
export * from "./request-outcome";
export * from "./route.normalizer";
export * from "./log-level";
