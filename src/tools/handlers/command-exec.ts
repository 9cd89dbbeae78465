import { execFile } from "node:child_process";
import { ToolError } from "../../errors.js";
import { resolveTarget } from "../../policy/patterns.js";
import { listArg, stringArg, type ToolHandler } from "./types.js";

const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

export interface CommandResult {
  readonly command: string;
  readonly arguments: readonly string[];
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

/**
 * Runs the command directly (never through a shell) from the tool's root.
 * Aborting the context signal kills the child process.
 */
export const commandExecHandler: ToolHandler = (ctx) => {
  const command = stringArg(ctx.args, "command");
  if (!command) return Promise.reject(new ToolError("command is required"));

  // Relative paths like ./build.sh were resolved by the policy engine.
  const executable = command.includes("/") ? (ctx.decision.target ?? command) : command;
  const args = listArg(ctx.args, "arguments") ?? [];
  const cwd = ctx.tool.entry.rootDirectory
    ? resolveTarget(ctx.tool.entry.rootDirectory, "/")
    : undefined;

  return new Promise<CommandResult>((resolve, reject) => {
    execFile(
      executable,
      args,
      { cwd, maxBuffer: MAX_OUTPUT_BYTES, signal: ctx.signal, windowsHide: true, shell: false },
      (error, stdout, stderr) => {
        if (error && (error.name === "AbortError" || ctx.signal.aborted)) {
          reject(error);
          return;
        }
        if (error && typeof error.code === "string") {
          reject(new ToolError(`Could not run ${command}: ${error.code}`, { cause: error }));
          return;
        }
        resolve({
          command,
          arguments: args,
          exitCode: error ? (typeof error.code === "number" ? error.code : -1) : 0,
          stdout: stdout.toString(),
          stderr: stderr.toString(),
        });
      },
    );
  });
};
