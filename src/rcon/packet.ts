import { EventEmitter } from "events";
import { DecodeResult, RCONPacket } from "./types";

export const HEADER_SIZE = 12;
export const REQUEST_ID = 1;

export function encodePacket(type: number, body: string, id: number = REQUEST_ID): Buffer {
  const payload = Buffer.from(body, "utf8");
  // id + type + payload + two NUL terminators
  const size = 8 + payload.length + 2;

  const packet = Buffer.alloc(size + 4);
  packet.writeInt32LE(size, 0);
  packet.writeInt32LE(id, 4);
  packet.writeInt32LE(type, 8);
  payload.copy(packet, HEADER_SIZE);

  return packet;
}

export function decodePacket(buffer: Buffer): DecodeResult {
  if (buffer.length < HEADER_SIZE) {
    return { status: "incomplete" };
  }

  const size = buffer.readInt32LE(0);
  if (size < 8) {
    return { status: "invalid", reason: `Invalid packet size ${size}` };
  }

  const total = size + 4;
  if (buffer.length < total) {
    return { status: "incomplete" };
  }

  const id = buffer.readInt32LE(4);
  const type = buffer.readInt32LE(8);
  const body = buffer.toString("utf8", HEADER_SIZE, total).replace(/\0+$/, "");

  return { status: "ok", packet: { size, id, type, body }, bytesRead: total };
}

/**
 * Buffers socket data and hands out one complete frame per read.
 * A read resolves null once the socket is gone, the frame is malformed,
 * or the timeout elapses first.
 */
export class PacketReader {
  private buffer: Buffer = Buffer.alloc(0);
  private closed = false;
  private wake: (() => void) | null = null;

  constructor(socket: EventEmitter) {
    socket.on("data", (chunk: Buffer) => {
      this.buffer = Buffer.concat([this.buffer, chunk]);
      this.notify();
    });
    socket.on("close", () => {
      this.closed = true;
      this.notify();
    });
    socket.on("error", (err: Error) => {
      console.error("❌ RCON socket error:", err.message);
      this.closed = true;
      this.notify();
    });
  }

  async read(timeoutMs: number): Promise<RCONPacket | null> {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const result = decodePacket(this.buffer);

      if (result.status === "ok") {
        this.buffer = this.buffer.subarray(result.bytesRead);
        return result.packet;
      }
      if (result.status === "invalid") {
        console.error(`❌ RCON framing error: ${result.reason}`);
        return null;
      }
      if (this.closed) {
        return null;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0 || !(await this.waitForData(remaining))) {
        return null;
      }
    }
  }

  private waitForData(ms: number): Promise<boolean> {
    return new Promise((resolve) => {
      const timeout = setTimeout(() => {
        this.wake = null;
        resolve(false);
      }, ms);

      this.wake = () => {
        clearTimeout(timeout);
        this.wake = null;
        resolve(true);
      };
    });
  }

  private notify() {
    this.wake?.();
  }
}
