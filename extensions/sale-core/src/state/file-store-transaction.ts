import { AsyncLocalStorage } from "node:async_hooks";
import fs from "node:fs/promises";
import path from "node:path";
import lockfile from "proper-lockfile";

const LOCK_OPTIONS = {
  retries: {
    retries: 10,
    factor: 1.6,
    minTimeout: 40,
    maxTimeout: 800,
    randomize: true,
  },
  stale: 15_000,
  realpath: false,
};

/** Files only ever appended to; rollback truncates them instead of rewriting them. */
const APPEND_ONLY_FILES = new Set(["audit-log.jsonl"]);

type StoreSnapshot = {
  files: Map<string, Buffer>;
  appendOnlySizes: Map<string, number>;
};

// Lock targets held by the current async call chain. Only calls made from inside a
// transaction join it; any other caller waits for the lock.
const heldLocks = new AsyncLocalStorage<ReadonlySet<string>>();

function isLockFile(name: string): boolean {
  return name.endsWith(".lock") || name.includes(".lock.");
}

async function captureStore(dir: string): Promise<StoreSnapshot> {
  const snapshot: StoreSnapshot = { files: new Map(), appendOnlySizes: new Map() };
  for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
    if (!entry.isFile() || isLockFile(entry.name)) continue;
    const fullPath = path.join(dir, entry.name);
    if (APPEND_ONLY_FILES.has(entry.name)) {
      snapshot.appendOnlySizes.set(entry.name, (await fs.stat(fullPath)).size);
    } else {
      snapshot.files.set(entry.name, await fs.readFile(fullPath));
    }
  }
  return snapshot;
}

async function restoreStore(dir: string, snapshot: StoreSnapshot): Promise<void> {
  for (const entry of await fs.readdir(dir, { withFileTypes: true })) {
    if (!entry.isFile() || isLockFile(entry.name)) continue;
    const fullPath = path.join(dir, entry.name);
    const size = snapshot.appendOnlySizes.get(entry.name);
    if (size !== undefined) {
      await fs.truncate(fullPath, size);
    } else if (!snapshot.files.has(entry.name)) {
      await fs.rm(fullPath, { force: true });
    }
  }
  for (const [name, data] of snapshot.files) {
    await fs.writeFile(path.join(dir, name), data);
  }
}

/**
 * Run `fn` under the store's directory lock. On failure the directory is put back the way
 * it was before `fn` started. Calls made from inside `fn` join the running transaction.
 */
export async function runFileStoreTransaction(
  dir: string,
  fn: () => void | Promise<void>,
): Promise<void> {
  const lockTarget = path.join(dir, "sale-store");
  const held = heldLocks.getStore();
  if (held?.has(lockTarget)) {
    await fn();
    return;
  }

  await fs.mkdir(dir, { recursive: true });
  const release = await lockfile.lock(lockTarget, LOCK_OPTIONS);
  try {
    const snapshot = await captureStore(dir);
    await heldLocks.run(new Set([...(held ?? []), lockTarget]), async () => {
      try {
        await fn();
      } catch (err) {
        await restoreStore(dir, snapshot);
        throw err;
      }
    });
  } finally {
    await release();
  }
}
