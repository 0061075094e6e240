import { Module } from "@nestjs/common";
import { AuditModule } from "@audit/audit.module";
import { AuthModule } from "@auth/auth.module";
import { TasksUseCase } from "@tasks/core/ports/in/tasks.use-case";
import { TasksRepositoryPort } from "@tasks/core/ports/out/tasks.repository.port";
import { PgTasksRepository } from "@tasks/infrastructure/pg-tasks.repository";
import { TasksController } from "@tasks/presentation/tasks.controller";
import { TasksService } from "@tasks/service/tasks.service";

@Module({
  imports: [AuthModule, AuditModule],
  controllers: [TasksController],
  providers: [
    { provide: TasksUseCase, useClass: TasksService },
    { provide: TasksRepositoryPort, useClass: PgTasksRepository },
  ],
})
export class TasksModule {}
