import { Command, Option } from "clipanion";
import { errorMessage } from "../../errors.js";
import { createRuntime, type Runtime } from "../../runtime/bootstrap.js";
import { ToolServer } from "../../server/tool-server.js";
import { parseNumber, tryLoadConfig } from "../shared.js";

export class ServeCommand extends Command {
  static override paths = [["serve"]];

  static override usage = Command.Usage({
    description: "Serve classification, policy checks, dispatch and memory over HTTP",
    examples: [
      ["Start with default config", "toolgate serve"],
      ["Listen on another port", "toolgate serve --port 8080"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  port = Option.String("--port,-p", { required: false });

  async execute(): Promise<void> {
    const out = this.context.stdout;
    const port = parseNumber(out, "--port", this.port);
    if (port === null) return;

    const config = tryLoadConfig(out, this.config);
    if (!config) return;

    let runtime: Runtime;
    try {
      runtime = createRuntime({ config });
    } catch (err) {
      out.write(`Failed to start: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    const server = new ToolServer({ runtime, port });
    await server.start();

    await new Promise<void>((resolve) => {
      process.once("SIGINT", () => resolve());
      process.once("SIGTERM", () => resolve());
    });

    await server.stop();
    await runtime.close();
  }
}
