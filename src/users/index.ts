export { UsersModule } from "./users.module";
export * from "./core/domain";
export * from "./core/dtos";
export { UsersRepositoryPort } from "./core/ports/out/users.repository.port";
