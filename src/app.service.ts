import { Inject, Injectable } from "@nestjs/common";
import { serviceConfig, ServiceConfig } from "@config/service.config";

export interface ServiceInfo {
  message: string;
  version: string;
  environment: string;
  status: "running";
}

@Injectable()
export class AppService {
  constructor(
    @Inject(serviceConfig.KEY) private readonly service: ServiceConfig,
  ) {}

  getInfo(): ServiceInfo {
    return {
      message: "Task Observability Service",
      version: this.service.version,
      environment: this.service.environment,
      status: "running",
    };
  }
}
