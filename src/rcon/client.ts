import { Socket } from "net";
import { sanitizeInput } from "../utils/validation";
import { encodePacket, PacketReader } from "./packet";
import { PacketType, RCONConfig, RCONPacket, RCONResponse } from "./types";

export const DEFAULT_TIMEOUT_MS = 5000;

export class RCONClient {
  private socket: Socket | null = null;
  private reader: PacketReader | null = null;
  private authenticated = false;
  private config: RCONConfig;
  private timeoutMs: number;

  constructor(config: RCONConfig) {
    this.config = config;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async connect(
    host: string = this.config.host,
    port: number = this.config.port,
    timeoutMs: number = this.timeoutMs
  ): Promise<boolean> {
    this.disconnect();
    this.timeoutMs = timeoutMs;

    try {
      this.socket = await this.openSocket(host, port, timeoutMs);
      this.reader = new PacketReader(this.socket);
      this.authenticated = await this.authenticate();
    } catch (error) {
      console.error(`❌ RCON connection to ${host}:${port} failed:`, errorMessage(error));
      this.disconnect();
      return false;
    }

    if (!this.authenticated) {
      console.error(`❌ RCON authentication with ${host}:${port} failed`);
      this.disconnect();
      return false;
    }

    return true;
  }

  private openSocket(host: string, port: number, timeoutMs: number): Promise<Socket> {
    return new Promise((resolve, reject) => {
      const socket = new Socket();

      const timeout = setTimeout(() => {
        socket.destroy();
        reject(new Error(`Connection timeout after ${timeoutMs}ms`));
      }, timeoutMs);

      const onError = (err: Error) => {
        clearTimeout(timeout);
        socket.destroy();
        reject(err);
      };

      socket.once("error", onError);
      socket.once("connect", () => {
        clearTimeout(timeout);
        socket.removeListener("error", onError);
        resolve(socket);
      });

      socket.connect(port, host);
    });
  }

  private async authenticate(): Promise<boolean> {
    await this.writePacket(PacketType.AUTH, this.config.password);

    let response = await this.readPacket();
    // Some servers send an empty RESPONSE_VALUE ahead of the auth response.
    // Others send only that frame, in which case it is the one judged.
    if (response && response.type === PacketType.RESPONSE_VALUE && response.body === "") {
      response = (await this.readPacket()) ?? response;
    }

    if (!response) {
      return false;
    }
    if (response.id === -1) {
      console.error("❌ RCON authentication rejected - invalid password");
      return false;
    }
    return true;
  }

  async execute(command: string): Promise<RCONResponse> {
    if (!this.authenticated) {
      console.error("❌ RCON command refused: not authenticated");
      return { success: false, error: "Not authenticated" };
    }

    try {
      await this.writePacket(PacketType.EXEC_COMMAND, sanitizeInput(command));
    } catch (error) {
      return { success: false, error: `Send failed: ${errorMessage(error)}` };
    }

    const response = await this.readPacket();
    if (!response) {
      return { success: false, error: `No response within ${this.timeoutMs}ms` };
    }
    return { success: true, data: response.body };
  }

  private writePacket(type: number, body: string): Promise<void> {
    const socket = this.socket;
    const packet = encodePacket(type, body);

    return new Promise((resolve, reject) => {
      if (!socket || socket.destroyed) {
        return reject(new Error("Socket not connected"));
      }
      socket.write(packet, (err) => (err ? reject(err) : resolve()));
    });
  }

  private async readPacket(): Promise<RCONPacket | null> {
    if (!this.reader) return null;
    return this.reader.read(this.timeoutMs);
  }

  isAuthenticated(): boolean {
    return this.authenticated;
  }

  disconnect(): void {
    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
    }
    this.reader = null;
    this.authenticated = false;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
