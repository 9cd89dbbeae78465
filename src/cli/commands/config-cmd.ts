import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { mergeRegistries, substituteEnv } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";
import { parseConfig } from "../../config/schema.js";
import { errorMessage } from "../../errors.js";
import { tryLoadConfig } from "../shared.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration (API key redacted)",
    examples: [["Show config", "toolgate config show"]],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    const config = tryLoadConfig(this.context.stdout, this.config);
    if (!config) return;

    const redacted = {
      ...config,
      inference: {
        ...config.inference,
        ...(config.inference.apiKey ? { apiKey: "***REDACTED***" } : {}),
      },
    };
    this.context.stdout.write(JSON.stringify(redacted, null, 2) + "\n");
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file and the registry files it names",
    examples: [
      ["Validate default config", "toolgate config validate"],
      ["Validate specific file", "toolgate config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  async execute(): Promise<void> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    try {
      const raw: unknown = JSON.parse(substituteEnv(content));
      const config = mergeRegistries(parseConfig(raw), dirname(resolve(configPath)));
      const tools = Object.keys(config.tools).filter((name) => config.tools[name]?.enabled);
      this.context.stdout.write(
        `Config is valid: ${configPath}\n` +
          `  Mode:    ${config.execution.mode}\n` +
          `  Tools:   ${tools.length > 0 ? tools.join(", ") : "(none)"}\n`,
      );
    } catch (err) {
      this.context.stdout.write(`Config is INVALID: ${configPath}\n  ${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}
