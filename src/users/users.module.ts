import { Module } from "@nestjs/common";
import { UsersRepositoryPort } from "@users/core/ports/out/users.repository.port";
import { PgUsersRepository } from "@users/infrastructure/pg-users.repository";

@Module({
  providers: [{ provide: UsersRepositoryPort, useClass: PgUsersRepository }],
  exports: [UsersRepositoryPort],
})
export class UsersModule {}
