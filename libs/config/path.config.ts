import { ConfigType, registerAs } from "@nestjs/config";
import { dirname, join } from "path";
import { existsSync } from "fs";

/**
 * Resolves the project root once (the nearest directory holding
 * package.json) so files shipped beside the code, like the SQL schema, are
 * found the same way from sources and from dist/.
 */
export const pathConfig = registerAs("paths", () => {
  let root = __dirname;

  while (root !== dirname(root)) {
    if (existsSync(join(root, "package.json"))) {
      break;
    }
    root = dirname(root);
  }

  if (!existsSync(join(root, "package.json"))) {
    root = process.cwd();
  }

  return {
    projectRoot: root,
    schemaFile: join(root, "db", "schema.sql"),
  };
});

export type PathConfig = ConfigType<typeof pathConfig>;
