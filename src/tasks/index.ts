export { TasksModule } from "./tasks.module";
export * from "./core/domain";
export * from "./core/dtos";
export { TasksUseCase } from "./core/ports/in/tasks.use-case";
export { TasksRepositoryPort } from "./core/ports/out/tasks.repository.port";
