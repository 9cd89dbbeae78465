import { Command, Option } from "clipanion";
import { classify } from "../../classifier/operation.js";
import { parseExecutionMode, plan } from "../../strategy/planner.js";
import { errorMessage } from "../../errors.js";

export class ClassifyCommand extends Command {
  static override paths = [["classify"]];

  static override usage = Command.Usage({
    description: "Classify a message and show the execution plan it would get",
    examples: [
      ["Classify a message", 'toolgate classify "My name is Matt"'],
      ["Plan under another mode", 'toolgate classify --mode dual_pass_all "What is my name?"'],
    ],
  });

  mode = Option.String("--mode", { description: "Execution mode to plan with", required: false });
  words = Option.Rest({ required: 1 });

  async execute(): Promise<void> {
    const message = this.words.join(" ");
    const operationType = classify(message);

    if (!this.mode) {
      this.context.stdout.write(`${operationType}\n`);
      return;
    }

    try {
      const turnPlan = plan(operationType, parseExecutionMode(this.mode), true);
      this.context.stdout.write(
        `${operationType}\n` +
          `  Passes:    ${turnPlan.passCount}\n` +
          `  Streamed:  ${turnPlan.streamFirstPass ? "yes" : "no"}\n` +
          `  Tools:     ${turnPlan.toolsEnabledInPass.map((on) => (on ? "on" : "off")).join(" / ")}\n` +
          (turnPlan.hazard ? `  Warning:   ${turnPlan.hazard}\n` : ""),
      );
    } catch (err) {
      this.context.stdout.write(`${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}
