import { Controller, Get, NotFoundException, Res } from "@nestjs/common";
import { Response } from "express";
import { SCRAPE_ENDPOINT } from "@metrics/core/domain";
import { MetricsUseCase } from "@metrics/core/ports/in/metrics.use-case";

/**
 * Pull endpoint for Prometheus scrapers. Hidden (404) while metrics are
 * disabled.
 */
@Controller()
export class MetricsController {
  constructor(private readonly metrics: MetricsUseCase) {}

  @Get(SCRAPE_ENDPOINT)
  async scrape(@Res({ passthrough: true }) res: Response): Promise<string> {
    if (!this.metrics.enabled) {
      throw new NotFoundException("Metrics are disabled");
    }

    res.setHeader("Content-Type", this.metrics.contentType);
    return this.metrics.exportText();
  }
}
