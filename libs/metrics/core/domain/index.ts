export * from "./metric-names";
export * from "./domain-event";
