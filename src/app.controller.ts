import { Controller, Get } from "@nestjs/common";
import { AppService, ServiceInfo } from "./app.service";

@Controller()
export class AppController {
  constructor(private readonly appService: AppService) {}

  @Get()
  getInfo(): ServiceInfo {
    return this.appService.getInfo();
  }
}
