import { Controller, Get } from "@nestjs/common";
import { HealthReport, ProbeResponse } from "@health/core/dtos";
import { HealthService } from "@health/service/health.service";

@Controller()
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get("api/v1/health")
  check(): Promise<HealthReport> {
    return this.healthService.check();
  }

  // Process probes never touch dependencies.
  @Get("live")
  live(): ProbeResponse {
    return this.healthService.probe("alive");
  }

  @Get("ready")
  ready(): ProbeResponse {
    return this.healthService.probe("ready");
  }
}
