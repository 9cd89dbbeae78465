import { Cli } from "clipanion";
import { createRequire } from "node:module";
import { ApprovalsGrantCommand, ApprovalsListCommand, ApprovalsRevokeCommand } from "./commands/approvals-cmd.js";
import { ChatCommand } from "./commands/chat.js";
import { ClassifyCommand } from "./commands/classify.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import {
  MemoryAddCommand,
  MemoryCompactCommand,
  MemoryDeleteCommand,
  MemoryGetCommand,
  MemorySearchCommand,
  MemoryStatsCommand,
  MemoryUpdateCommand,
} from "./commands/memory-cmd.js";
import { ServeCommand } from "./commands/serve.js";

const require = createRequire(import.meta.url);
const pkg = require("../../package.json") as { version: string };

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Toolgate",
    binaryName: "toolgate",
    binaryVersion: pkg.version,
  });

  cli.register(ChatCommand);
  cli.register(ClassifyCommand);
  cli.register(ServeCommand);

  // Memory commands
  cli.register(MemoryAddCommand);
  cli.register(MemoryGetCommand);
  cli.register(MemorySearchCommand);
  cli.register(MemoryUpdateCommand);
  cli.register(MemoryDeleteCommand);
  cli.register(MemoryStatsCommand);
  cli.register(MemoryCompactCommand);

  // Approval commands
  cli.register(ApprovalsListCommand);
  cli.register(ApprovalsGrantCommand);
  cli.register(ApprovalsRevokeCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}
