export * from "./span-attributes";
export * from "./span-result";
