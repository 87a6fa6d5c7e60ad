#!/usr/bin/env node
import { Command } from "commander";
import chalk from "chalk";
import * as fs from "fs";

import { loadConfig } from "./config/testsift.config.js";
import {
  buildConnectionOverride,
  buildSettingsUpdate,
  parseBooleanOption,
  parseNumberOption,
  parseThemeOption,
  type SetCommandOptions,
  type TestCommandOptions
} from "./cli/update-options.js";
import {
  formatConnectionResult,
  formatFieldErrors,
  formatModelList,
  formatServiceStatus,
  formatSettings
} from "./cli/format.js";
import { RestoreFormatError, SettingsError, ValidationError, describeError } from "./settings/errors.js";
import { createSettingsService, type SettingsService } from "./settings/service.js";
import type { SettingsUpdate } from "./settings/types.js";

const program = new Command();

program
  .name("testsift")
  .description("🔐 Settings and credentials for the testsift failure triage tool")
  .version("0.1.0")
  .option("--config <file>", "Config file path", "testsift.yml");

function openService(): SettingsService {
  const { config } = program.opts<{ config: string }>();
  return createSettingsService(loadConfig(config));
}

function print(lines: string[], color: (text: string) => string = text => text): void {
  for (const line of lines) {
    console.log(color(line));
  }
}

function fail(error: unknown): never {
  if (error instanceof ValidationError || (error instanceof RestoreFormatError && error.fieldErrors)) {
    console.error(chalk.red(`\n❌ ${error.message}`));
    print(formatFieldErrors(error.fieldErrors ?? {}).map(line => `   ${line}`), chalk.red);
  } else if (error instanceof SettingsError) {
    console.error(chalk.red(`\n❌ ${error.name}: ${error.message}`));
  } else {
    console.error(chalk.red("\n❌ Error:"), describeError(error));
  }
  process.exit(1);
}

const settings = program.command("settings").description("Inspect and change stored settings");

// ─────────────────────────────────────────────────────────────
// SHOW / STATUS - read-only views
// ─────────────────────────────────────────────────────────────
settings
  .command("show")
  .description("Show current settings with secrets masked")
  .option("--json", "Print as JSON")
  .action(async (options: { json?: boolean }) => {
    try {
      const current = await openService().getSettings();
      if (options.json) {
        console.log(JSON.stringify(current, null, 2));
        return;
      }
      print(formatSettings(current));
    } catch (error) {
      fail(error);
    }
  });

settings
  .command("status")
  .description("Show which services are configured")
  .action(async () => {
    try {
      print(formatServiceStatus(await openService().serviceStatus()));
    } catch (error) {
      fail(error);
    }
  });

settings
  .command("validate")
  .description("Validate the stored settings")
  .action(async () => {
    try {
      const fieldErrors = await openService().validateCurrent();
      const lines = formatFieldErrors(fieldErrors);
      if (lines.length === 0) {
        console.log(chalk.green("✅ Settings are valid"));
        return;
      }
      console.log(chalk.yellow("⚠️  Settings have problems:"));
      print(lines.map(line => `   ${line}`), chalk.yellow);
      process.exit(1);
    } catch (error) {
      fail(error);
    }
  });

// ─────────────────────────────────────────────────────────────
// SET - partial update; omitted flags keep stored values
// ─────────────────────────────────────────────────────────────
settings
  .command("set")
  .description("Update settings; secrets left out keep their stored value")
  .option("--from-json <file>", "Read the update from a JSON file")
  .option("--jenkins-url <url>", "Jenkins base URL")
  .option("--jenkins-username <name>", "Jenkins user")
  .option("--jenkins-token <token>", "Jenkins API token")
  .option("--jenkins-verify-ssl <bool>", "Verify Jenkins TLS certificates", parseBooleanOption)
  .option("--github-token <token>", "GitHub personal access token")
  .option("--ai-key <key>", "AI service API key")
  .option("--ai-model <model>", "AI model name")
  .option("--ai-temperature <n>", "Sampling temperature (0-2)", parseNumberOption)
  .option("--ai-max-tokens <n>", "Maximum output tokens", parseNumberOption)
  .option("--theme <theme>", "light, dark or system", parseThemeOption)
  .option("--language <code>", "UI language, e.g. en or en-US")
  .option("--auto-refresh <bool>", "Refresh results automatically", parseBooleanOption)
  .option("--results-per-page <n>", "Rows per results page", parseNumberOption)
  .action(async (options: SetCommandOptions & { fromJson?: string }) => {
    try {
      const service = openService();

      let update: SettingsUpdate;
      if (options.fromJson) {
        if (!fs.existsSync(options.fromJson)) {
          throw new Error(`Update file not found: ${options.fromJson}`);
        }
        const raw: unknown = JSON.parse(fs.readFileSync(options.fromJson, "utf-8"));
        update = service.parseSettingsUpdate(raw);
      } else {
        update = buildSettingsUpdate(options);
      }

      if (Object.keys(update).length === 0) {
        console.log(chalk.yellow("⚠️  Nothing to update"));
        return;
      }

      const updated = await service.updateSettings(update);
      console.log(chalk.green("✅ Settings saved\n"));
      print(formatSettings(updated), chalk.gray);
    } catch (error) {
      fail(error);
    }
  });

// ─────────────────────────────────────────────────────────────
// TEST - live connectivity probe
// ─────────────────────────────────────────────────────────────
settings
  .command("test <service>")
  .description("Test the connection to jenkins, github or ai")
  .option("--url <url>", "Jenkins URL to use instead of the stored one")
  .option("--username <name>", "Jenkins user to use instead of the stored one")
  .option("--api-token <token>", "Jenkins API token to use instead of the stored one")
  .option("--token <token>", "GitHub token to use instead of the stored one")
  .option("--api-key <key>", "AI API key to use instead of the stored one")
  .option("--model <model>", "AI model to check instead of the stored one")
  .option("--insecure", "Skip Jenkins TLS certificate verification")
  .action(async (service: string, options: TestCommandOptions) => {
    try {
      console.log(chalk.blue(`🔌 Testing ${service}...`));
      const result = await openService().testConnection(service, buildConnectionOverride(options));
      if (result.success) {
        print(formatConnectionResult(result), chalk.green);
        return;
      }
      print(formatConnectionResult(result), chalk.red);
      process.exit(1);
    } catch (error) {
      fail(error);
    }
  });

// ─────────────────────────────────────────────────────────────
// BACKUP / RESTORE / RESET
// ─────────────────────────────────────────────────────────────
settings
  .command("backup")
  .description("Write a backup of the current settings")
  .option("--stdout", "Print the backup instead of writing a file")
  .action(async (options: { stdout?: boolean }) => {
    try {
      const service = openService();
      if (options.stdout) {
        console.log(JSON.stringify(await service.backup(), null, 2));
        return;
      }
      const backupPath = await service.saveBackup();
      console.log(chalk.green(`✅ Backup written to ${backupPath}`));
    } catch (error) {
      fail(error);
    }
  });

settings
  .command("backups")
  .description("List backup files, newest first")
  .action(async () => {
    try {
      const backups = await openService().listBackups();
      if (backups.length === 0) {
        console.log(chalk.gray("No backups yet"));
        return;
      }
      print(backups);
    } catch (error) {
      fail(error);
    }
  });

settings
  .command("restore <file>")
  .description("Replace all settings with a backup file")
  .action(async (file: string) => {
    try {
      if (!fs.existsSync(file)) {
        throw new Error(`Backup file not found: ${file}`);
      }
      const restored = await openService().restoreFromFile(file);
      console.log(chalk.green("✅ Settings restored\n"));
      print(formatSettings(restored), chalk.gray);
    } catch (error) {
      fail(error);
    }
  });

settings
  .command("reset")
  .description("Back up, then reset all settings to defaults")
  .option("--yes", "Confirm the reset")
  .action(async (options: { yes?: boolean }) => {
    try {
      if (!options.yes) {
        console.log(chalk.yellow("⚠️  This replaces every setting with its default. Re-run with --yes to confirm."));
        process.exit(1);
      }
      await openService().resetToDefaults();
      console.log(chalk.green("✅ Settings reset to defaults (previous settings backed up)"));
    } catch (error) {
      fail(error);
    }
  });

// ─────────────────────────────────────────────────────────────
// MODELS - list text-generation models for the AI key
// ─────────────────────────────────────────────────────────────
program
  .command("models")
  .description("List AI models available to the configured key")
  .option("--api-key <key>", "API key to use instead of the stored one")
  .action(async (options: { apiKey?: string }) => {
    try {
      const result = await openService().listModels(options.apiKey);
      print(formatModelList(result), result.success ? chalk.white : chalk.red);
      if (!result.success) {
        process.exit(1);
      }
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
