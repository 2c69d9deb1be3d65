import { EventEmitter } from "events";
import { describe, test, expect } from "vitest";
import { decodePacket, encodePacket, PacketReader } from "./packet";
import { PacketType } from "./types";

describe("encodePacket", () => {
  test("should lay out size, id, type, body and two terminators", () => {
    const packet = encodePacket(PacketType.AUTH, "pw");
    expect([...packet]).toEqual([
      12, 0, 0, 0,
      1, 0, 0, 0,
      3, 0, 0, 0,
      0x70, 0x77,
      0, 0,
    ]);
  });

  test("should count UTF-8 bytes, not characters, in the size", () => {
    const packet = encodePacket(PacketType.EXEC_COMMAND, "é");
    expect(packet.readInt32LE(0)).toBe(12);
    expect(packet.length).toBe(16);
  });
});

describe("decodePacket", () => {
  test.each([
    ["empty", ""],
    ["command", "SaveWorld"],
    ["large", "x".repeat(4096)],
  ])("should round-trip a %s body", (_, body) => {
    const result = decodePacket(encodePacket(PacketType.EXEC_COMMAND, body));
    expect(result.status).toBe("ok");
    if (result.status !== "ok") return;
    expect(result.packet.id).toBe(1);
    expect(result.packet.type).toBe(PacketType.EXEC_COMMAND);
    expect(result.packet.body).toBe(body);
    expect(result.bytesRead).toBe(14 + Buffer.byteLength(body));
  });

  test("should report a partial header as incomplete", () => {
    const partial = encodePacket(PacketType.RESPONSE_VALUE, "hello").subarray(0, 6);
    expect(decodePacket(partial)).toEqual({ status: "incomplete" });
  });

  test("should report a partial body as incomplete", () => {
    const partial = encodePacket(PacketType.RESPONSE_VALUE, "hello").subarray(0, 15);
    expect(decodePacket(partial)).toEqual({ status: "incomplete" });
  });

  test("should reject a size smaller than the id and type fields", () => {
    const header = Buffer.alloc(12);
    header.writeInt32LE(4, 0);
    expect(decodePacket(header)).toEqual({ status: "invalid", reason: "Invalid packet size 4" });
  });

  test("should decode a size=8 frame as an empty body", () => {
    const header = Buffer.alloc(12);
    header.writeInt32LE(8, 0);
    header.writeInt32LE(1, 4);
    header.writeInt32LE(2, 8);

    const result = decodePacket(header);
    expect(result).toEqual({
      status: "ok",
      packet: { size: 8, id: 1, type: 2, body: "" },
      bytesRead: 12,
    });
  });

  test("should replace invalid UTF-8 instead of throwing", () => {
    const frame = Buffer.alloc(16);
    frame.writeInt32LE(12, 0);
    frame.writeInt32LE(1, 4);
    frame.writeInt32LE(0, 8);
    frame[12] = 0xff;
    frame[13] = 0x41;

    const result = decodePacket(frame);
    expect(result.status === "ok" && result.packet.body).toBe("\uFFFDA");
  });

  test("should leave the following frame untouched", () => {
    const first = encodePacket(PacketType.RESPONSE_VALUE, "one");
    const both = Buffer.concat([first, encodePacket(PacketType.RESPONSE_VALUE, "two")]);

    const result = decodePacket(both);
    expect(result.status === "ok" && result.bytesRead).toBe(first.length);
  });
});

describe("PacketReader", () => {
  test("should assemble a frame split across chunks", async () => {
    const socket = new EventEmitter();
    const reader = new PacketReader(socket);
    const frame = encodePacket(PacketType.RESPONSE_VALUE, "There are 0 players", 7);

    const pending = reader.read(1000);
    socket.emit("data", frame.subarray(0, 5));
    socket.emit("data", frame.subarray(5, 13));
    socket.emit("data", frame.subarray(13));

    const packet = await pending;
    expect(packet?.id).toBe(7);
    expect(packet?.body).toBe("There are 0 players");
  });

  test("should hand out back-to-back frames one per read", async () => {
    const socket = new EventEmitter();
    const reader = new PacketReader(socket);
    socket.emit("data", Buffer.concat([
      encodePacket(PacketType.RESPONSE_VALUE, "first"),
      encodePacket(PacketType.RESPONSE_VALUE, "second"),
    ]));

    expect((await reader.read(100))?.body).toBe("first");
    expect((await reader.read(100))?.body).toBe("second");
  });

  test("should return null when the socket closes after 6 header bytes", async () => {
    const socket = new EventEmitter();
    const reader = new PacketReader(socket);

    const pending = reader.read(1000);
    socket.emit("data", Buffer.from([14, 0, 0, 0, 1, 0]));
    socket.emit("close");

    expect(await pending).toBeNull();
  });

  test("should return null when nothing arrives before the timeout", async () => {
    const reader = new PacketReader(new EventEmitter());
    expect(await reader.read(20)).toBeNull();
  });

  test("should return null on a socket error", async () => {
    const socket = new EventEmitter();
    const reader = new PacketReader(socket);

    const pending = reader.read(1000);
    socket.emit("error", new Error("read ECONNRESET"));

    expect(await pending).toBeNull();
  });
});
