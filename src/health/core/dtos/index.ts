export * from "./health-report";
