// In-process RCON server used by the tests
import { createServer, Server, Socket } from "net";
import { decodePacket, encodePacket } from "./packet";
import { PacketType, RCONPacket } from "./types";

export type PacketHandler = (packet: RCONPacket, socket: Socket) => void;

export function replyTo(socket: Socket, packet: RCONPacket, body: string, type: number = PacketType.RESPONSE_VALUE) {
  socket.write(encodePacket(type, body, packet.id));
}

// Accepts any password and answers commands with "echo: <command>"
export const defaultHandler: PacketHandler = (packet, socket) => {
  if (packet.type === PacketType.AUTH) {
    replyTo(socket, packet, "", PacketType.AUTH_RESPONSE);
  } else {
    replyTo(socket, packet, `echo: ${packet.body}`);
  }
};

export class FakeRCONServer {
  readonly received: RCONPacket[] = [];
  connections = 0;
  bytesReceived = 0;
  private server: Server;
  private sockets = new Set<Socket>();

  constructor(private handler: PacketHandler = defaultHandler) {
    this.server = createServer((socket) => {
      this.connections++;
      this.sockets.add(socket);
      socket.on("close", () => this.sockets.delete(socket));
      socket.on("error", () => socket.destroy());

      let pending: Buffer = Buffer.alloc(0);
      socket.on("data", (chunk: Buffer) => {
        this.bytesReceived += chunk.length;
        pending = Buffer.concat([pending, chunk]);

        for (;;) {
          const result = decodePacket(pending);
          if (result.status !== "ok") break;
          pending = pending.subarray(result.bytesRead);
          this.received.push(result.packet);
          this.handler(result.packet, socket);
        }
      });
    });
  }

  setHandler(handler: PacketHandler) {
    this.handler = handler;
  }

  listen(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(0, "127.0.0.1", () => {
        const address = this.server.address();
        if (address && typeof address === "object") {
          resolve(address.port);
        } else {
          reject(new Error("Fake RCON server has no TCP address"));
        }
      });
    });
  }

  close(): Promise<void> {
    for (const socket of this.sockets) socket.destroy();
    return new Promise((resolve) => this.server.close(() => resolve()));
  }
}
