import { ConfigType, registerAs } from "@nestjs/config";
import { readString } from "./env.parsers";
import { isDevelopmentEnvironment } from "./env.validation";

/**
 * Static identity stamped onto every log event, span resource and probe.
 */
export const serviceConfig = registerAs("service", () => {
  const environment = readString("ENVIRONMENT", "production");
  return {
    name: readString("APP_NAME", "task-observability-service"),
    version: readString("APP_VERSION", "1.0.0"),
    environment,
    isDevelopment: isDevelopmentEnvironment(environment),
  };
});

export type ServiceConfig = ConfigType<typeof serviceConfig>;
