import { homedir } from "node:os";
import { basename, isAbsolute, normalize, relative, resolve, sep } from "node:path";
import picomatch from "picomatch";

const GLOB_OPTIONS: picomatch.PicomatchOptions = { dot: true };

export function expandHome(target: string): string {
  if (target === "~") return homedir();
  if (target.startsWith("~/")) return resolve(homedir(), target.slice(2));
  return target;
}

/** Absolute, normalized form of `target`; relative targets are taken from `root`. */
export function resolveTarget(target: string, root: string): string {
  const expanded = expandHome(target.trim());
  return normalize(isAbsolute(expanded) ? expanded : resolve(root, expanded));
}

export function isRelativeTarget(target: string): boolean {
  const trimmed = target.trim();
  return !isAbsolute(trimmed) && trimmed !== "~" && !trimmed.startsWith("~/");
}

export function isWithinRoot(target: string, root: string): boolean {
  const fromRoot = relative(root, target);
  if (fromRoot.length === 0) return true;
  return fromRoot !== ".." && !fromRoot.startsWith(`..${sep}`) && !isAbsolute(fromRoot);
}

function stripLeadingSlash(value: string): string {
  return value.replace(/^\/+/, "");
}

export function globMatch(candidate: string, pattern: string): boolean {
  return picomatch.isMatch(stripLeadingSlash(candidate), stripLeadingSlash(pattern), GLOB_OPTIONS);
}

/**
 * Whitelist semantics:
 * - a pattern without `/` matches the last path segment (`*.md`, `git`)
 * - a pattern ending in `/` admits the directory and everything below it
 * - any other pattern matches the whole resolved path; relative patterns are
 *   anchored at `root`
 */
export function matchesPattern(resolved: string, pattern: string, root: string): boolean {
  if (!pattern.includes("/")) {
    return globMatch(basename(resolved), pattern);
  }

  const anchored = expandHome(pattern);
  if (anchored.endsWith("/")) {
    const dir = resolveTarget(anchored, root);
    return isWithinRoot(resolved, dir);
  }

  const full = isAbsolute(anchored) ? normalize(anchored) : resolve(root, anchored);
  return globMatch(resolved, full);
}

export function findWhitelistMatch(
  resolved: string,
  patterns: readonly string[],
  root: string,
): string | undefined {
  return patterns.find((pattern) => matchesPattern(resolved, pattern, root));
}
