export * from "./user-response";
