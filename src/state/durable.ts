import { mkdir, open, readFile, rename, stat, unlink, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

/** A lock file older than this is assumed abandoned. */
export const STALE_LOCK_AGE_MS = 5 * 60_000;

const LOCK_RETRY_MIN_MS = 25;
const LOCK_RETRY_MAX_MS = 500;

export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}

const hasCode = (e: unknown, code: string) => isErrnoException(e) && e.code === code;

/**
 * Write JSON through a temp file and rename, so readers see either the old
 * document or the new one.
 */
export async function atomicWriteJson(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.${process.pid}.${Date.now().toString(36)}.tmp`;

  const fh = await open(tmp, "w");
  try {
    await fh.writeFile(JSON.stringify(data, null, 2) + "\n", "utf8");
    await fh.sync();
  } catch (e) {
    await fh.close();
    await unlink(tmp).catch(() => undefined);
    throw e;
  }
  await fh.close();

  try {
    await rename(tmp, path);
  } catch (e) {
    await unlink(tmp).catch(() => undefined);
    throw e;
  }
}

/** Parsed JSON, or null when the file does not exist. */
export async function readJsonFile(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (e) {
    if (hasCode(e, "ENOENT")) return null;
    throw e;
  }
  return JSON.parse(raw) as unknown;
}

function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    // EPERM: the process exists but belongs to someone else.
    return hasCode(e, "EPERM");
  }
}

/** Remove `lockPath` when it is too old or its owner has exited. */
async function reapLock(lockPath: string): Promise<void> {
  let ageMs: number;
  let owner: number;
  try {
    ageMs = Date.now() - (await stat(lockPath)).mtimeMs;
    owner = Number((await readFile(lockPath, "utf8")).split("\n")[0]);
  } catch (e) {
    if (hasCode(e, "ENOENT")) return;
    throw e;
  }

  let reason: string | null = null;
  if (ageMs > STALE_LOCK_AGE_MS) reason = `stale, ${Math.round(ageMs / 1000)}s old`;
  else if (Number.isInteger(owner) && owner > 0 && owner !== process.pid && !processAlive(owner)) {
    reason = `owner ${owner} exited`;
  }
  if (reason === null) return;

  console.warn(`[trainctl] Removing lock (${reason}): ${lockPath}`);
  await unlink(lockPath).catch((e: unknown) => {
    if (!hasCode(e, "ENOENT")) throw e;
  });
}

/** Run `fn` while holding an exclusive lock file next to `targetPath`. */
export async function withFileLock<T>(targetPath: string, fn: () => Promise<T>, timeoutMs = 5000): Promise<T> {
  const lockPath = `${targetPath}.lock`;
  await mkdir(dirname(lockPath), { recursive: true });
  const deadline = Date.now() + timeoutMs;
  let delay = LOCK_RETRY_MIN_MS;

  for (;;) {
    try {
      await writeFile(lockPath, `${process.pid}\n${new Date().toISOString()}\n`, { flag: "wx" });
      break;
    } catch (e) {
      if (!hasCode(e, "EEXIST")) throw e;
    }
    await reapLock(lockPath);
    if (Date.now() > deadline) throw new Error(`Timed out waiting for lock: ${lockPath}`);
    await new Promise((r) => setTimeout(r, delay + Math.random() * delay * 0.2));
    delay = Math.min(delay * 2, LOCK_RETRY_MAX_MS);
  }

  try {
    return await fn();
  } finally {
    await unlink(lockPath).catch((e: unknown) => {
      if (!hasCode(e, "ENOENT")) throw e;
    });
  }
}
