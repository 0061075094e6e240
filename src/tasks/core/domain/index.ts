export * from "./task.entity";
