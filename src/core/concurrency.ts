import fs from "node:fs";
import path from "node:path";

export type WorkspaceLease = {
  dir: string;
  lockPath: string;
  release: () => void;
};

export type WorkspaceAcquisition =
  | { allowed: true; lease: WorkspaceLease }
  | { allowed: false; holder: string; reason: string };

const LOCK_FILE = ".workspace.lock";

/**
 * Exclusive ownership of a workspace directory, held through a lock file
 * created with O_EXCL. A second acquisition while the lock exists is refused.
 */
export function acquireWorkspace(dir: string, owner: string): WorkspaceAcquisition {
  fs.mkdirSync(dir, { recursive: true });
  const lockPath = path.join(dir, LOCK_FILE);

  let fd: number;
  try {
    fd = fs.openSync(lockPath, "wx");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "EEXIST") {
      const holder = readHolder(lockPath);
      return { allowed: false, holder, reason: `Workspace ${dir} is held by ${holder}` };
    }
    throw err;
  }

  try {
    fs.writeSync(fd, JSON.stringify({ owner, pid: process.pid, acquired_at: new Date().toISOString() }));
  } finally {
    fs.closeSync(fd);
  }

  let released = false;
  return {
    allowed: true,
    lease: {
      dir,
      lockPath,
      release: () => {
        if (released) return;
        released = true;
        fs.rmSync(lockPath, { force: true });
      },
    },
  };
}

function readHolder(lockPath: string): string {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(lockPath, "utf8"));
    if (parsed !== null && typeof parsed === "object" && "owner" in parsed && typeof parsed.owner === "string") {
      return parsed.owner;
    }
  } catch {
    // Lock written by something else; report it without an owner
  }
  return "unknown owner";
}

/**
 * Map over `items` with at most `limit` calls in flight. Results keep input
 * order; the first rejection is rethrown after in-flight calls settle.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const failures: unknown[] = [];

  const worker = async () => {
    while (failures.length === 0 && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        failures.push(error);
      }
    }
  };

  const width = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: width }, () => worker()));
  if (failures.length > 0) throw failures[0];
  return results;
}
