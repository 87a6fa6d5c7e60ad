import { z } from "zod";
import * as fs from "fs";
import * as path from "path";
import * as yaml from "yaml";

// Zod schema for configuration validation
const StorageSchema = z.object({
  data_dir: z.string().min(1).default("data"),
  settings_file: z.string().min(1).default("settings.json"),
  key_file: z.string().min(1).default("settings.key"),
  backup_dir: z.string().min(1).default("backups")
});

const ConnectionsSchema = z.object({
  timeout_ms: z.number().int().positive().max(120000).default(10000),
  github_api_url: z.string().url().default("https://api.github.com")
});

const ConfigSchema = z.object({
  version: z.number().default(1),
  storage: StorageSchema.default({}),
  connections: ConnectionsSchema.default({})
});

export type TestsiftConfig = z.infer<typeof ConfigSchema>;
export type StorageConfig = z.infer<typeof StorageSchema>;
export type ConnectionsConfig = z.infer<typeof ConnectionsSchema>;

export interface StoragePaths {
  dataDir: string;
  settingsPath: string;
  keyPath: string;
  backupDir: string;
}

/**
 * Load and validate configuration from a YAML file
 */
export function loadConfig(configPath: string = "testsift.yml"): TestsiftConfig {
  try {
    if (!fs.existsSync(configPath)) {
      console.log(`Config file not found at ${configPath}, using defaults`);
      return ConfigSchema.parse({});
    }

    const content = fs.readFileSync(configPath, "utf-8");
    const parsed: unknown = yaml.parse(content);
    return ConfigSchema.parse(parsed ?? {});
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error("Configuration validation error:");
      error.errors.forEach((err) => {
        console.error(`  - ${err.path.join(".")}: ${err.message}`);
      });
      throw new Error("Invalid configuration");
    }
    throw error;
  }
}

/**
 * Get default configuration
 */
export function getDefaultConfig(): TestsiftConfig {
  return ConfigSchema.parse({});
}

/**
 * Resolve storage locations. Relative file names live inside data_dir.
 */
export function resolveStoragePaths(storage: StorageConfig, baseDir: string = process.cwd()): StoragePaths {
  const dataDir = path.resolve(baseDir, storage.data_dir);
  return {
    dataDir,
    settingsPath: path.resolve(dataDir, storage.settings_file),
    keyPath: path.resolve(dataDir, storage.key_file),
    backupDir: path.resolve(dataDir, storage.backup_dir)
  };
}
