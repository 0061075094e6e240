import { Module } from "@nestjs/common";
import { HealthController } from "@health/presentation/health.controller";
import { HealthService } from "@health/service/health.service";

@Module({
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
