import { Module, ValidationPipe } from "@nestjs/common";
import { APP_PIPE } from "@nestjs/core";
import { ConfigModule } from "@nestjs/config";
import { configNamespaces, validateEnvironment } from "@config/index";
import { DatabaseModule } from "@database";
import { LoggingModule } from "@logging";
import { MetricsModule } from "@metrics";
import { ObservabilityModule } from "@observability";
import { TracingModule } from "@tracing";
import { AuditModule } from "@audit";
import { AuthModule } from "@auth";
import { HealthModule } from "@health";
import { TasksModule } from "@tasks";
import { UsersModule } from "@users";
import { AppController } from "./app.controller";
import { AppService } from "./app.service";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ".env",
      load: configNamespaces,
      validate: validateEnvironment,
    }),
    LoggingModule,
    MetricsModule,
    TracingModule,
    DatabaseModule,
    ObservabilityModule,
    UsersModule,
    AuditModule,
    AuthModule,
    TasksModule,
    HealthModule,
  ],
  controllers: [AppController],
  providers: [
    AppService,
    {
      provide: APP_PIPE,
      useFactory: () =>
        new ValidationPipe({ whitelist: true, transform: true }),
    },
  ],
})
export class AppModule {}
