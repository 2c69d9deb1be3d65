import { readdir, readFile, stat } from "fs/promises";
import { basename, join } from "path";

export const LOGS_DIR = ["ShooterGame", "Saved", "Logs"];
export const DEFAULT_TAIL_LINES = 50;

export interface LogFile {
  name: string;
  path: string;
  sizeBytes: number;
  modified: Date;
}

export function logDir(serverDir: string): string {
  return join(serverDir, ...LOGS_DIR);
}

/** Newest first. A missing log directory yields an empty list. */
export async function listLogs(serverDir: string, limit: number = 10): Promise<LogFile[]> {
  const dir = logDir(serverDir);

  let names: string[];
  try {
    names = await readdir(dir);
  } catch {
    return [];
  }

  const files: LogFile[] = [];
  for (const name of names.filter((n) => n.endsWith(".log"))) {
    const path = join(dir, name);
    const info = await stat(path);
    if (info.isFile()) {
      files.push({ name, path, sizeBytes: info.size, modified: info.mtime });
    }
  }

  return files
    .sort((a, b) => b.modified.getTime() - a.modified.getTime())
    .slice(0, limit);
}

export async function tailLog(path: string, lines: number = DEFAULT_TAIL_LINES): Promise<string[]> {
  const text = await readFile(path, "utf8");
  const all = text.split(/\r?\n/);
  if (all.length > 0 && all[all.length - 1] === "") all.pop();
  return lines > 0 ? all.slice(-lines) : [];
}

export function formatLogList(files: LogFile[]): string {
  return files
    .map((f, i) => `${i + 1}. ${f.name} (${(f.sizeBytes / 1024).toFixed(1)} KB, ${f.modified.toISOString().slice(0, 16).replace("T", " ")})`)
    .join("\n");
}

/** Resolves a log name inside the log directory, refusing paths that step outside it. */
export function resolveLogName(serverDir: string, name: string): string | null {
  if (basename(name) !== name || !name.endsWith(".log")) return null;
  return join(logDir(serverDir), name);
}
