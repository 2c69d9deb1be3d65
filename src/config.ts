import { join, resolve } from "path";
import { z } from "zod";
import { RCONConfig } from "./rcon/types";
import {
  DEFAULT_GAME_PORT,
  DEFAULT_QUERY_PORT,
  DEFAULT_RCON_PORT,
  MAX_PASSWORD_LENGTH,
  MIN_PASSWORD_LENGTH,
  validatePort,
  validateStrongPassword,
} from "./utils/validation";

export const SERVER_EXECUTABLE_PATH = ["ShooterGame", "Binaries", "Win64", "ArkAscendedServer.exe"];

const EnvSchema = z.object({
  ARK_RCON_HOST: z.string().min(1).default("127.0.0.1"),
  ARK_RCON_PORT: z.coerce.number().int().default(DEFAULT_RCON_PORT),
  ARK_RCON_PASSWORD: z.string().default(""),
  ARK_RCON_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

export function getRCONConfig(env: NodeJS.ProcessEnv = process.env): RCONConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid RCON environment: ${issues.join("; ")}`);
  }

  return {
    host: parsed.data.ARK_RCON_HOST,
    port: parsed.data.ARK_RCON_PORT,
    password: parsed.data.ARK_RCON_PASSWORD,
    timeoutMs: parsed.data.ARK_RCON_TIMEOUT_MS,
  };
}

export function validateRCONConfig(config: RCONConfig): void {
  if (!config.host) {
    throw new Error("RCON host cannot be empty");
  }
  validatePort(config.port);
  if (!validateStrongPassword(config.password)) {
    throw new Error(
      `RCON password must be ${MIN_PASSWORD_LENGTH}-${MAX_PASSWORD_LENGTH} characters (set ARK_RCON_PASSWORD)`
    );
  }
}

export interface ServerConfig {
  serverDir: string;
  backupDir: string;
  executable: string;
  map: string;
  gamePort: number;
  queryPort: number;
  maxPlayers: number;
}

const ServerEnvSchema = z.object({
  ARK_SERVER_DIR: z.string().min(1).default("."),
  ARK_BACKUP_DIR: z.string().min(1).optional(),
  ARK_SERVER_EXECUTABLE: z.string().min(1).optional(),
  ARK_MAP: z.string().min(1).default("TheIsland_WP"),
  ARK_GAME_PORT: z.coerce.number().int().default(DEFAULT_GAME_PORT),
  ARK_QUERY_PORT: z.coerce.number().int().default(DEFAULT_QUERY_PORT),
  ARK_MAX_PLAYERS: z.coerce.number().int().positive().default(10),
});

export function getServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = ServerEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid server environment: ${issues.join("; ")}`);
  }

  const serverDir = resolve(parsed.data.ARK_SERVER_DIR);
  return {
    serverDir,
    backupDir: resolve(parsed.data.ARK_BACKUP_DIR ?? join(serverDir, "..", "backups")),
    executable: parsed.data.ARK_SERVER_EXECUTABLE ?? join(serverDir, ...SERVER_EXECUTABLE_PATH),
    map: parsed.data.ARK_MAP,
    gamePort: parsed.data.ARK_GAME_PORT,
    queryPort: parsed.data.ARK_QUERY_PORT,
    maxPlayers: parsed.data.ARK_MAX_PLAYERS,
  };
}
