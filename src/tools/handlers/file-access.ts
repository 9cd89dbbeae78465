import { readdir, readFile, realpath, stat, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { ToolError } from "../../errors.js";
import { isWithinRoot, resolveTarget } from "../../policy/patterns.js";
import { stringArg, type HandlerContext, type ToolHandler } from "./types.js";

export const MAX_FILE_BYTES = 10 * 1024 * 1024;

export interface DirectoryEntry {
  readonly name: string;
  readonly type: "file" | "directory" | "other";
}

function errnoCode(err: unknown): string | undefined {
  return err instanceof Error && "code" in err && typeof err.code === "string" ? err.code : undefined;
}

async function realPathOf(path: string): Promise<string | undefined> {
  try {
    return await realpath(path);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return undefined;
    throw err;
  }
}

/**
 * The policy engine reasons about path strings only. Before touching the disk
 * make sure symlinks do not lead out of the root.
 */
async function assertRealPathInRoot(ctx: HandlerContext, path: string): Promise<void> {
  const rootDir = ctx.tool.entry.rootDirectory;
  if (!rootDir) return;

  const root = resolveTarget(rootDir, "/");
  if (!isWithinRoot(path, root)) return;

  const realRoot = (await realPathOf(root)) ?? root;
  const real = (await realPathOf(path)) ?? (await realPathOf(dirname(path)));
  if (real !== undefined && !isWithinRoot(real, realRoot)) {
    throw new ToolError(`${path} leads outside ${root} through a symbolic link`);
  }
}

function describeFsError(err: unknown, path: string): ToolError {
  switch (errnoCode(err)) {
    case "ENOENT":
      return new ToolError(`No such file or directory: ${path}`, { cause: err });
    case "EACCES":
    case "EPERM":
      return new ToolError(`Permission denied: ${path}`, { cause: err });
    case "EISDIR":
      return new ToolError(`${path} is a directory; use the list operation`, { cause: err });
    case "ENOTDIR":
      return new ToolError(`${path} is not a directory`, { cause: err });
    default:
      return new ToolError(err instanceof Error ? err.message : String(err), { cause: err });
  }
}

async function readText(path: string, signal: AbortSignal): Promise<Record<string, unknown>> {
  const info = await stat(path);
  if (info.isDirectory()) throw new ToolError(`${path} is a directory; use the list operation`);
  if (info.size > MAX_FILE_BYTES) {
    throw new ToolError(`${path} is ${info.size} bytes, over the ${MAX_FILE_BYTES} byte limit`);
  }
  const content = await readFile(path, { encoding: "utf-8", signal });
  return { path, size: info.size, content };
}

async function writeText(path: string, content: string, signal: AbortSignal): Promise<Record<string, unknown>> {
  const bytes = Buffer.byteLength(content);
  if (bytes > MAX_FILE_BYTES) {
    throw new ToolError(`Content is ${bytes} bytes, over the ${MAX_FILE_BYTES} byte limit`);
  }
  await writeFile(path, content, { encoding: "utf-8", signal });
  return { path, bytesWritten: bytes };
}

async function listDirectory(path: string): Promise<Record<string, unknown>> {
  const dirents = await readdir(path, { withFileTypes: true });
  const entries: DirectoryEntry[] = dirents
    .map((dirent): DirectoryEntry => ({
      name: dirent.name,
      type: dirent.isDirectory() ? "directory" : dirent.isFile() ? "file" : "other",
    }))
    .sort((a, b) => a.name.localeCompare(b.name));
  return { path, count: entries.length, entries };
}

export const fileAccessHandler: ToolHandler = async (ctx) => {
  const path = ctx.decision.target;
  if (!path) throw new ToolError("file_access was dispatched without a resolved path");

  const operation = stringArg(ctx.args, "operation");
  await assertRealPathInRoot(ctx, path);

  try {
    switch (operation) {
      case "read":
        return await readText(path, ctx.signal);
      case "write":
        return await writeText(path, stringArg(ctx.args, "content") ?? "", ctx.signal);
      case "list":
        return await listDirectory(path);
      default:
        throw new ToolError(`Unsupported operation: ${String(operation)}`);
    }
  } catch (err) {
    if (err instanceof ToolError) throw err;
    throw describeFsError(err, path);
  }
};
