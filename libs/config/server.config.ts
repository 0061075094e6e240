import { ConfigType, registerAs } from "@nestjs/config";
import { readInteger, readString } from "./env.parsers";

export const serverConfig = registerAs("server", () => ({
  host: readString("HOST", "0.0.0.0"),
  port: readInteger("PORT", 8000),
}));

export type ServerConfig = ConfigType<typeof serverConfig>;
