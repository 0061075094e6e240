export * from "./create-task.dto";
export * from "./update-task.dto";
export * from "./list-tasks.query";
export * from "./task-response";
