export * from "./token";
export * from "./authenticated-request";
