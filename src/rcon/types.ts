export interface RCONConfig {
  host: string;
  port: number;
  password: string;
  timeoutMs?: number;
}

export type RCONResponse =
  | { success: true; data: string }
  | { success: false; error: string };

export const PacketType = {
  RESPONSE_VALUE: 0,
  EXEC_COMMAND: 2,
  AUTH_RESPONSE: 2,
  AUTH: 3,
} as const;

export interface RCONPacket {
  size: number;
  id: number;
  type: number;
  body: string;
}

export type DecodeResult =
  | { status: "incomplete" }
  | { status: "invalid"; reason: string }
  | { status: "ok"; packet: RCONPacket; bytesRead: number };
