export { serviceConfig, ServiceConfig } from "./service.config";
export { serverConfig, ServerConfig } from "./server.config";
export {
  observabilityConfig,
  ObservabilityConfig,
} from "./observability.config";
export { databaseConfig, DatabaseConfig } from "./database.config";
export { authConfig, AuthConfig } from "./auth.config";
export { pathConfig, PathConfig } from "./path.config";
export {
  validateEnvironment,
  EnvironmentVariables,
  JwtAlgorithm,
  JWT_ALGORITHMS,
} from "./env.validation";

import { serviceConfig } from "./service.config";
import { serverConfig } from "./server.config";
import { observabilityConfig } from "./observability.config";
import { databaseConfig } from "./database.config";
import { authConfig } from "./auth.config";
import { pathConfig } from "./path.config";

export const configNamespaces = [
  serviceConfig,
  serverConfig,
  observabilityConfig,
  databaseConfig,
  authConfig,
  pathConfig,
];
