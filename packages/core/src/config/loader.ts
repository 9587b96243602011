import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { ConfigError } from "../errors/catalog.js";
import {
  ServerConfigSchema,
  type ServerConfig,
} from "../schemas/server-config.js";
import { configPathIn, resolveRootPath } from "./paths.js";

export interface LoadConfigOptions {
  configPath?: string;
  rootPath?: string;
}

function configPathOf(options?: LoadConfigOptions): string {
  return (
    options?.configPath ?? configPathIn(resolveRootPath(options?.rootPath))
  );
}

export async function loadConfig(
  options?: LoadConfigOptions,
): Promise<ServerConfig> {
  const configPath = configPathOf(options);

  let raw: string | undefined;
  try {
    raw = await readFile(configPath, "utf-8");
  } catch (err: unknown) {
    if (
      !(err instanceof Error && "code" in err && err.code === "ENOENT")
    ) {
      throw err;
    }
  }

  let parsed: unknown = {};
  if (raw !== undefined) {
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ConfigError(
        configPath,
        `Config is not valid JSON: ${configPath}`,
        { cause: err },
      );
    }
  }

  const result = ServerConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? issue.path.map(String).join(".") : "";
    throw new ConfigError(
      configPath,
      `Invalid config at ${where || "(root)"}: ${issue?.message ?? "unknown"}`,
      { cause: result.error },
    );
  }
  const config = result.data;

  // Write back so that defaults are visible and editable in config.json
  const serialized = JSON.stringify(config, null, 2) + "\n";
  if (serialized !== raw) {
    await mkdir(dirname(configPath), { recursive: true });
    await writeFile(configPath, serialized);
  }

  return config;
}
