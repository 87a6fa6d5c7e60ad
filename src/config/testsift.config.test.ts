import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { getDefaultConfig, loadConfig, resolveStoragePaths } from "./testsift.config.js";

describe("testsift config", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "testsift-config-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("falls back to defaults when the file is missing", () => {
    const configPath = path.join(dir, "missing.yml");

    expect(loadConfig(configPath)).toEqual(getDefaultConfig());
    expect(console.log).toHaveBeenCalledWith(`Config file not found at ${configPath}, using defaults`);
  });

  it("merges file values over defaults", () => {
    const configPath = path.join(dir, "testsift.yml");
    fs.writeFileSync(configPath, "storage:\n  data_dir: /var/lib/testsift\nconnections:\n  timeout_ms: 2500\n");

    const config = loadConfig(configPath);

    expect(config.storage).toEqual({
      data_dir: "/var/lib/testsift",
      settings_file: "settings.json",
      key_file: "settings.key",
      backup_dir: "backups"
    });
    expect(config.connections).toEqual({ timeout_ms: 2500, github_api_url: "https://api.github.com" });
  });

  it("treats an empty file as defaults", () => {
    const configPath = path.join(dir, "testsift.yml");
    fs.writeFileSync(configPath, "");

    expect(loadConfig(configPath)).toEqual(getDefaultConfig());
  });

  it("prints each problem and refuses an invalid file", () => {
    const configPath = path.join(dir, "testsift.yml");
    fs.writeFileSync(configPath, "connections:\n  timeout_ms: -5\n");

    expect(() => loadConfig(configPath)).toThrow("Invalid configuration");
    expect(console.error).toHaveBeenCalledWith("Configuration validation error:");
  });

  it("resolves storage files inside the data directory", () => {
    expect(resolveStoragePaths(getDefaultConfig().storage, "/srv/app")).toEqual({
      dataDir: "/srv/app/data",
      settingsPath: "/srv/app/data/settings.json",
      keyPath: "/srv/app/data/settings.key",
      backupDir: "/srv/app/data/backups"
    });
  });
});
