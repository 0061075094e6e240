export * from "./user.entity";
