import { describe, test, expect } from "vitest";
import { buildRCONCommand, generateToolSchemas, parseToolArgs, TailLogSchema, TOOLS } from "./tools";

describe("generateToolSchemas", () => {
  test("should expose every catalogue tool, rcon_execute and the host tools", () => {
    const names = generateToolSchemas().map((tool) => tool.name);
    expect(names).toEqual([
      ...Object.keys(TOOLS),
      "rcon_execute",
      "server_start",
      "server_stop",
      "server_status",
      "create_backup",
      "list_logs",
      "tail_log",
    ]);
  });

  test("should mark required params", () => {
    const kick = generateToolSchemas().find((tool) => tool.name === "kick_player");
    expect(kick?.inputSchema).toEqual({
      type: "object",
      properties: { steamId: { type: "string", description: "Player Steam ID" } },
      required: ["steamId"],
    });
  });

  test("should give every placeholder a param", () => {
    for (const [name, tool] of Object.entries(TOOLS)) {
      const placeholders = [...tool.rcon.matchAll(/\{(\w+)\}/g)].map((m) => m[1]);
      expect(placeholders.sort(), name).toEqual(Object.keys(tool.params).sort());
    }
  });
});

describe("buildRCONCommand", () => {
  test("should build commands without params", () => {
    expect(buildRCONCommand("save_world")).toBe("SaveWorld");
    expect(buildRCONCommand("list_players", {})).toBe("ListPlayers");
  });

  test("should substitute params", () => {
    expect(buildRCONCommand("broadcast", { message: "Restart in 5 minutes" })).toBe("Broadcast Restart in 5 minutes");
    expect(buildRCONCommand("kick_player", { steamId: "76561190000000001" })).toBe("KickPlayer 76561190000000001");
  });

  test("should collapse extra whitespace", () => {
    expect(buildRCONCommand("server_chat", { message: "  hello   there " })).toBe("ServerChat hello there");
  });

  test("should throw when a required param is missing", () => {
    expect(() => buildRCONCommand("set_time_of_day", {})).toThrow(/^Invalid arguments for set_time_of_day: time/);
  });

  test("should throw for unknown tools", () => {
    expect(() => buildRCONCommand("fly_to_moon")).toThrow("Unknown tool: fly_to_moon");
  });
});

describe("TailLogSchema", () => {
  test("should default to 50 lines of the newest log", () => {
    expect(TailLogSchema.parse({})).toEqual({ lines: 50 });
  });

  test("should reject a line count over 1000", () => {
    expect(TailLogSchema.safeParse({ lines: 5000 }).success).toBe(false);
  });
});

describe("parseToolArgs", () => {
  test("should drop params the tool does not declare", () => {
    expect(parseToolArgs("ban_player", { steamId: "123", reason: "griefing" })).toEqual({ steamId: "123" });
  });

  test("should reject an empty string for a required param", () => {
    expect(() => parseToolArgs("broadcast", { message: "" })).toThrow(/message/);
  });
});
