import { ChildProcess, spawn } from "child_process";
import { access } from "fs/promises";
import { ServerConfig } from "../config";
import { sanitizeInput, validatePort } from "../utils/validation";

export const STOP_TIMEOUT_MS = 30000;

export type LaunchOptions = Pick<ServerConfig, "map" | "gamePort" | "queryPort" | "maxPlayers">;

export type ControlResult =
  | { success: true; message: string; pid?: number }
  | { success: false; error: string };

export function buildLaunchArgs(options: LaunchOptions): string[] {
  const map = sanitizeInput(options.map, 64);
  return [
    `${map}?listen`,
    `-Port=${validatePort(options.gamePort)}`,
    `-QueryPort=${validatePort(options.queryPort)}`,
    `-MaxPlayers=${options.maxPlayers}`,
    "-WinLiveMaxPlayers=10",
    "-server",
    "-log",
  ];
}

/** Owns the dedicated server's OS process: start, graceful stop, status. */
export class ServerController {
  private process: ChildProcess | null = null;

  constructor(
    private config: ServerConfig,
    private stopTimeoutMs: number = STOP_TIMEOUT_MS
  ) {}

  async isInstalled(): Promise<boolean> {
    try {
      await access(this.config.executable);
      return true;
    } catch {
      return false;
    }
  }

  isRunning(): boolean {
    return this.process !== null && this.process.exitCode === null && this.process.signalCode === null;
  }

  getPid(): number | undefined {
    return this.isRunning() ? this.process?.pid : undefined;
  }

  async start(): Promise<ControlResult> {
    if (this.isRunning()) {
      return { success: false, error: `Server is already running (pid ${this.getPid()})` };
    }
    if (!(await this.isInstalled())) {
      return { success: false, error: `Server executable not found: ${this.config.executable}` };
    }

    let args: string[];
    try {
      args = buildLaunchArgs(this.config);
    } catch (error) {
      return { success: false, error: error instanceof Error ? error.message : String(error) };
    }

    console.error(`Starting server: ${this.config.executable} ${args.join(" ")}`);

    const proc = spawn(this.config.executable, args, {
      cwd: this.config.serverDir,
      stdio: "ignore",
    });

    return new Promise((resolve) => {
      proc.once("error", (err) => {
        this.process = null;
        resolve({ success: false, error: `Failed to start server: ${err.message}` });
      });
      proc.once("spawn", () => {
        this.process = proc;
        proc.once("exit", (code, signal) => {
          console.error(`Server process exited (code ${code}, signal ${signal})`);
        });
        console.error(`✅ Server started (pid ${proc.pid})`);
        resolve({ success: true, message: `Server started (pid ${proc.pid})`, pid: proc.pid });
      });
    });
  }

  /** SIGTERM, then SIGKILL once the stop timeout passes. */
  async stop(): Promise<ControlResult> {
    const proc = this.process;
    if (!proc || !this.isRunning()) {
      this.process = null;
      return { success: false, error: "Server is not running" };
    }

    const exited = new Promise<void>((resolve) => proc.once("exit", () => resolve()));

    console.error("Stopping server gracefully...");
    proc.kill("SIGTERM");

    let timer: NodeJS.Timeout | undefined;
    const timedOut = await Promise.race([
      exited.then(() => false),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(true), this.stopTimeoutMs);
      }),
    ]);
    clearTimeout(timer);

    this.process = null;
    if (timedOut) {
      console.error("⚠️ Graceful shutdown timed out, forcing...");
      proc.kill("SIGKILL");
      await exited;
      return { success: true, message: "Server killed after graceful shutdown timed out" };
    }

    console.error("✅ Server stopped");
    return { success: true, message: "Server stopped" };
  }
}
