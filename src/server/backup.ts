import { cp, mkdir, readdir, stat } from "fs/promises";
import { join } from "path";

export const SAVED_DIR = ["ShooterGame", "Saved"];

export type BackupResult =
  | { success: true; path: string; sizeBytes: number }
  | { success: false; error: string };

// 2026-10-19T08:05:03 -> 20261019_080503, local time
export function backupTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export async function directorySize(dir: string): Promise<number> {
  let total = 0;
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      total += await directorySize(path);
    } else if (entry.isFile()) {
      total += (await stat(path)).size;
    }
  }
  return total;
}

/**
 * Copies ShooterGame/Saved (world saves, Config/ and Logs/) into
 * `<backupDir>/backup_<timestamp>/Saved`.
 */
export async function createBackup(
  serverDir: string,
  backupDir: string,
  now: Date = new Date()
): Promise<BackupResult> {
  const savedDir = join(serverDir, ...SAVED_DIR);

  try {
    if (!(await stat(savedDir)).isDirectory()) {
      return { success: false, error: `${savedDir} is not a directory` };
    }
  } catch {
    console.error(`⚠️ No Saved directory at ${savedDir} - nothing to back up`);
    return { success: false, error: `No Saved directory found at ${savedDir}` };
  }

  const backupPath = join(backupDir, `backup_${backupTimestamp(now)}`);

  try {
    await mkdir(backupPath, { recursive: true });
    await cp(savedDir, join(backupPath, "Saved"), { recursive: true });

    const sizeBytes = await directorySize(backupPath);
    console.error(`✅ Backup created: ${backupPath} (${(sizeBytes / (1024 * 1024)).toFixed(2)} MB)`);
    return { success: true, path: backupPath, sizeBytes };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`❌ Backup failed: ${message}`);
    return { success: false, error: `Backup failed: ${message}` };
  }
}
