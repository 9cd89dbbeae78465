import * as lockfile from "proper-lockfile";

export interface FileLockOptions {
  readonly retries?: number;
  readonly minTimeoutMs?: number;
  readonly staleMs?: number;
}

// Writers inside one process queue here first, so the lockfile only
// arbitrates between processes.
const localQueues = new Map<string, Promise<unknown>>();

export async function withFileLock<T>(
  filePath: string,
  fn: () => T | Promise<T>,
  opts?: FileLockOptions,
): Promise<T> {
  const previous = localQueues.get(filePath) ?? Promise.resolve();
  const run = previous.catch(() => undefined).then(() => lockAndRun(filePath, fn, opts));
  const settled = run.catch(() => undefined);
  localQueues.set(filePath, settled);
  try {
    return await run;
  } finally {
    if (localQueues.get(filePath) === settled) {
      localQueues.delete(filePath);
    }
  }
}

async function lockAndRun<T>(
  filePath: string,
  fn: () => T | Promise<T>,
  opts?: FileLockOptions,
): Promise<T> {
  let release: (() => Promise<void>) | undefined;
  try {
    release = await lockfile.lock(filePath, {
      retries: { retries: opts?.retries ?? 5, minTimeout: opts?.minTimeoutMs ?? 100 },
      stale: opts?.staleMs ?? 10_000,
      realpath: false,
    });
    return await fn();
  } finally {
    await release?.();
  }
}
