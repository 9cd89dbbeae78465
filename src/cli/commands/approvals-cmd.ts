import { Command, Option } from "clipanion";
import { getStateDir } from "../../config/paths.js";
import { ApprovalStore } from "../../policy/approvals.js";

export class ApprovalsListCommand extends Command {
  static override paths = [["approvals", "list"]];

  static override usage = Command.Usage({
    description: "List tool calls waiting for approval, or already granted",
    examples: [
      ["List pending approvals", "toolgate approvals list"],
      ["List granted approvals", "toolgate approvals list --status granted"],
    ],
  });

  status = Option.String("--status", { description: "pending or granted", required: false });

  async execute(): Promise<void> {
    const status = this.status ?? "pending";
    if (status !== "pending" && status !== "granted") {
      this.context.stdout.write(`Unknown status: ${status}\n`);
      process.exitCode = 1;
      return;
    }

    const store = new ApprovalStore(getStateDir());
    const records = await store.list(status);

    if (records.length === 0) {
      this.context.stdout.write(`No ${status} approvals.\n`);
      return;
    }

    this.context.stdout.write(`${status === "pending" ? "Pending" : "Granted"} approvals (${records.length}):\n`);
    for (const record of records) {
      const target = record.target ? `  target=${record.target}` : "";
      this.context.stdout.write(
        `  ${record.fingerprint.slice(0, 12)}  tool=${record.toolName}${target}\n` +
          `    ${JSON.stringify(record.arguments)}\n`,
      );
    }
  }
}

export class ApprovalsGrantCommand extends Command {
  static override paths = [["approvals", "grant"]];

  static override usage = Command.Usage({
    description: "Approve a pending tool call so its next identical request may run",
    examples: [["Grant by fingerprint prefix", "toolgate approvals grant 3f9a2c71b0d4"]],
  });

  fingerprint = Option.String({ name: "fingerprint", required: true });
  by = Option.String("--by", { description: "Who granted it", required: false });

  async execute(): Promise<void> {
    const store = new ApprovalStore(getStateDir());
    const record = await store.grant(this.fingerprint, this.by ?? "cli");

    if (!record) {
      this.context.stdout.write(`No approval request found for: ${this.fingerprint}\n`);
      process.exitCode = 1;
      return;
    }

    this.context.stdout.write(
      `Granted ${record.fingerprint.slice(0, 12)}\n` +
        `  Tool:      ${record.toolName}\n` +
        `  Arguments: ${JSON.stringify(record.arguments)}\n`,
    );
  }
}

export class ApprovalsRevokeCommand extends Command {
  static override paths = [["approvals", "revoke"]];

  static override usage = Command.Usage({
    description: "Remove an approval request or grant",
    examples: [["Revoke by fingerprint prefix", "toolgate approvals revoke 3f9a2c71b0d4"]],
  });

  fingerprint = Option.String({ name: "fingerprint", required: true });

  async execute(): Promise<void> {
    const store = new ApprovalStore(getStateDir());

    if (await store.revoke(this.fingerprint)) {
      this.context.stdout.write(`Revoked ${this.fingerprint}\n`);
    } else {
      this.context.stdout.write(`No approval request found for: ${this.fingerprint}\n`);
      process.exitCode = 1;
    }
  }
}
