import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
  UseGuards,
} from "@nestjs/common";
import { RequestOrigin } from "@audit/core/domain";
import { Origin } from "@audit/presentation/origin.decorator";
import { CurrentUser } from "@auth/presentation/current-user.decorator";
import { JwtAuthGuard } from "@auth/presentation/jwt-auth.guard";
import {
  CreateTaskDto,
  ListTasksQuery,
  TaskResponse,
  toTaskResponse,
  UpdateTaskDto,
} from "@tasks/core/dtos";
import { TasksUseCase } from "@tasks/core/ports/in/tasks.use-case";
import { User } from "@users/core/domain";

@Controller("api/v1/tasks")
@UseGuards(JwtAuthGuard)
export class TasksController {
  constructor(private readonly tasks: TasksUseCase) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async create(
    @CurrentUser() user: User,
    @Body() dto: CreateTaskDto,
    @Origin() origin: RequestOrigin,
  ): Promise<TaskResponse> {
    return toTaskResponse(await this.tasks.create(user, dto, origin));
  }

  @Get()
  async list(
    @CurrentUser() user: User,
    @Query() query: ListTasksQuery,
  ): Promise<TaskResponse[]> {
    const tasks = await this.tasks.list(user, query);
    return tasks.map(toTaskResponse);
  }

  @Get(":id")
  async get(
    @CurrentUser() user: User,
    @Param("id", ParseIntPipe) id: number,
  ): Promise<TaskResponse> {
    return toTaskResponse(await this.tasks.get(user, id));
  }

  @Patch(":id")
  async update(
    @CurrentUser() user: User,
    @Param("id", ParseIntPipe) id: number,
    @Body() dto: UpdateTaskDto,
    @Origin() origin: RequestOrigin,
  ): Promise<TaskResponse> {
    return toTaskResponse(await this.tasks.update(user, id, dto, origin));
  }

  @Delete(":id")
  @HttpCode(HttpStatus.NO_CONTENT)
  async delete(
    @CurrentUser() user: User,
    @Param("id", ParseIntPipe) id: number,
    @Origin() origin: RequestOrigin,
  ): Promise<void> {
    await this.tasks.delete(user, id, origin);
  }
}
