import { Command, Option } from "clipanion";
import { createInterface } from "node:readline/promises";
import type { ToolgateConfig } from "../../config/types.js";
import { errorMessage } from "../../errors.js";
import { createRuntime, type Runtime } from "../../runtime/bootstrap.js";
import type { ChatSession } from "../../session/coordinator.js";
import { parseExecutionMode } from "../../strategy/planner.js";
import { tryLoadConfig } from "../shared.js";

export class ChatCommand extends Command {
  static override paths = [["chat"], Command.Default];

  static override usage = Command.Usage({
    description: "Chat with the model, letting it call the configured tools",
    details: `
      Without \`--message\` this starts an interactive session. Type \`/reset\`
      to clear the conversation and \`/exit\` to leave. Background passes are
      finished before the command exits.
    `,
    examples: [
      ["Start a session", "toolgate chat"],
      ["Send one message", 'toolgate chat --message "Remember that my name is Matt"'],
      ["Override the execution mode", "toolgate chat --mode dual_pass_write_only"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  mode = Option.String("--mode", { description: "Execution mode for this session", required: false });
  message = Option.String("--message", { description: "Send one message and exit", required: false });

  async execute(): Promise<void> {
    const out = this.context.stdout;
    const loaded = tryLoadConfig(out, this.config);
    if (!loaded) return;

    let config: ToolgateConfig = loaded;
    let runtime: Runtime;
    try {
      if (this.mode) {
        config = { ...loaded, execution: { ...loaded.execution, mode: parseExecutionMode(this.mode) } };
      }
      runtime = createRuntime({ config });
    } catch (err) {
      out.write(`Failed to start: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    const session = runtime.createSession();
    session.on("token", (token) => out.write(token));
    session.on("background", (event) => {
      if (event.status === "rejected") {
        this.context.stderr.write(`[background pass failed: ${event.error}]\n`);
      }
    });

    try {
      if (this.message !== undefined) {
        await this.turn(session, this.message);
      } else {
        await this.interactive(session);
      }
    } finally {
      await runtime.close();
    }
  }

  private async turn(session: ChatSession, text: string): Promise<void> {
    const out = this.context.stdout;
    try {
      const result = await session.send(text);
      if (!result.streamed) out.write(result.answer);
      out.write("\n");
      if (result.exhausted) {
        out.write("[stopped at the tool round limit]\n");
      }
      for (const fingerprint of result.pendingApprovals) {
        out.write(`Approval needed: toolgate approvals grant ${fingerprint.slice(0, 12)}\n`);
      }
    } catch (err) {
      out.write(`Error: ${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }

  private async interactive(session: ChatSession): Promise<void> {
    const rl = createInterface({ input: this.context.stdin, output: this.context.stdout, terminal: false });
    try {
      this.context.stdout.write("> ");
      for await (const line of rl) {
        const text = line.trim();
        if (text === "/exit") break;
        if (text === "/reset") {
          session.reset();
          this.context.stdout.write("Conversation cleared.\n");
        } else if (text.length > 0) {
          await this.turn(session, text);
        }
        this.context.stdout.write("> ");
      }
    } finally {
      rl.close();
    }
  }
}
