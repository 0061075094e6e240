import {
  Inject,
  Injectable,
  ServiceUnavailableException,
} from "@nestjs/common";
import { serviceConfig, ServiceConfig } from "@config/service.config";
import { DatabasePort } from "@database/core/ports/out/database.port";
import { LoggingService } from "@logging/service/logging.service";
import { HealthReport, ProbeResponse } from "@health/core/dtos";

@Injectable()
export class HealthService {
  constructor(
    private readonly database: DatabasePort,
    private readonly loggingService: LoggingService,
    @Inject(serviceConfig.KEY) private readonly service: ServiceConfig,
  ) {}

  /**
   * Full check including the database. A failed ping is a 503.
   */
  async check(): Promise<HealthReport> {
    try {
      await this.database.ping();
    } catch (error) {
      this.loggingService.error("Health check failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new ServiceUnavailableException("Service unhealthy");
    }

    this.loggingService.info("Health check successful");
    return {
      status: "healthy",
      timestamp: new Date().toISOString(),
      version: this.service.version,
      environment: this.service.environment,
      database: "healthy",
    };
  }

  probe(status: ProbeResponse["status"]): ProbeResponse {
    return { status, timestamp: Date.now() / 1000 };
  }
}
