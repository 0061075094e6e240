import { ServiceUnavailableException } from "@nestjs/common";
import { Test, TestingModule } from "@nestjs/testing";
import { serviceConfig } from "@config/service.config";
import { InfrastructureError } from "@database/core/domain";
import { DatabasePort } from "@database/core/ports/out/database.port";
import { LoggingService } from "@logging/service/logging.service";
import { HealthService } from "./health.service";

describe("HealthService", () => {
  let service: HealthService;

  const mockDatabase = { ping: jest.fn() };
  const mockLoggingService = { info: jest.fn(), error: jest.fn() };

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HealthService,
        { provide: DatabasePort, useValue: mockDatabase },
        { provide: LoggingService, useValue: mockLoggingService },
        {
          provide: serviceConfig.KEY,
          useValue: {
            name: "task-observability-service",
            version: "2.3.4",
            environment: "test",
            isDevelopment: true,
          },
        },
      ],
    }).compile();

    service = module.get<HealthService>(HealthService);
  });

  it("should report healthy when the database answers", async () => {
    mockDatabase.ping.mockResolvedValue(undefined);

    await expect(service.check()).resolves.toEqual({
      status: "healthy",
      timestamp: expect.any(String),
      version: "2.3.4",
      environment: "test",
      database: "healthy",
    });
  });

  it("should answer 503 when the database ping fails", async () => {
    mockDatabase.ping.mockRejectedValue(
      new InfrastructureError("Database operation failed"),
    );

    await expect(service.check()).rejects.toThrow(
      new ServiceUnavailableException("Service unhealthy"),
    );
    expect(mockLoggingService.error).toHaveBeenCalledWith(
      "Health check failed",
      { error: "Database operation failed" },
    );
  });

  it("should stamp probes with epoch seconds", () => {
    jest.spyOn(Date, "now").mockReturnValue(1_700_000_000_500);

    expect(service.probe("alive")).toEqual({
      status: "alive",
      timestamp: 1_700_000_000.5,
    });
    jest.restoreAllMocks();
  });
});
