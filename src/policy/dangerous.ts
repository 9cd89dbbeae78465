import { basename } from "node:path";
import { globMatch, isRelativeTarget, resolveTarget } from "./patterns.js";

/** System and credential locations. Matched against resolved absolute paths. */
export const DANGEROUS_PATH_PATTERNS: readonly string[] = [
  "/etc",
  "/etc/**",
  "/sys/**",
  "/proc/**",
  "/dev/**",
  "/boot/**",
  "/root/**",
  "**/.ssh",
  "**/.ssh/**",
  "**/.aws/**",
  "**/.gnupg/**",
  "**/.kube/**",
  "**/*.key",
  "**/*.pem",
  "**/*credentials*",
  "**/*password*",
  "**/.env",
  "**/*.env",
];

const PRIVILEGE_VERBS = new Set(["sudo", "su", "doas"]);
const POWER_VERBS = new Set(["shutdown", "reboot", "halt", "poweroff"]);
const KILL_VERBS = new Set(["kill", "pkill", "killall"]);
const OWNERSHIP_VERBS = new Set(["chmod", "chown", "chgrp"]);
const WIPE_VERBS = new Set(["dd", "format", "fdisk", "shred", "wipefs"]);

export function dangerousPathRule(resolved: string): string | undefined {
  return DANGEROUS_PATH_PATTERNS.find((pattern) => globMatch(resolved, pattern));
}

function isRecursiveFlag(arg: string): boolean {
  if (arg === "--recursive") return true;
  return /^-[a-zA-Z]*[rR][a-zA-Z]*$/.test(arg);
}

/**
 * First dangerous pattern `arg` lands on once resolved against `root`.
 * A relative argument only counts when it leaves the area the root itself sits
 * in, so a root under /root does not make every file name sensitive.
 */
function dangerousArgument(arg: string, root: string): string | undefined {
  const resolved = resolveTarget(arg, root);
  if (!isRelativeTarget(arg)) return dangerousPathRule(resolved);
  return DANGEROUS_PATH_PATTERNS.find((pattern) => globMatch(resolved, pattern) && !globMatch(root, pattern));
}

/**
 * Names the destructive action a command would take, if any. Every non-flag
 * argument is treated as a possible path relative to `root`.
 */
export function dangerousCommandRule(
  command: string,
  args: readonly string[],
  root: string,
): string | undefined {
  const verb = basename(command.trim()).toLowerCase();

  if (verb === "rm" && args.some(isRecursiveFlag)) return "recursive delete";
  if (verb.startsWith("mkfs")) return "filesystem format";
  if (WIPE_VERBS.has(verb)) return "disk overwrite";
  if (OWNERSHIP_VERBS.has(verb)) return "permission change";
  if (KILL_VERBS.has(verb)) return "process kill";
  if (PRIVILEGE_VERBS.has(verb)) return "privilege escalation";
  if (POWER_VERBS.has(verb)) return "shutdown";

  for (const arg of args) {
    if (arg.trim() === "" || arg.startsWith("-")) continue;
    const rule = dangerousArgument(arg, root);
    if (rule) return `sensitive path argument (${rule})`;
  }
  return undefined;
}
