import { describe, test, expect } from "vitest";
import { parseChatLine, parseChatLines } from "./parser";

describe("Chat Parser", () => {
  test("should parse a player line", () => {
    const result = parseChatLine("survivor42 (Rex Tamer): anyone near the volcano?");
    expect(result).toEqual({
      player: "survivor42",
      character: "Rex Tamer",
      message: "anyone near the volcano?",
    });
  });

  test("should parse a server broadcast line", () => {
    expect(parseChatLine("SERVER: Restart in 5 minutes")).toEqual({
      player: "SERVER",
      message: "Restart in 5 minutes",
    });
  });

  test("should keep colons inside the message", () => {
    const result = parseChatLine("alice (Bob): meet at 12:30");
    expect(result?.message).toBe("meet at 12:30");
  });

  test("should ignore the no-response placeholder", () => {
    expect(parseChatLine("Server received, But no response!! ")).toBeNull();
  });

  test("should ignore unrecognised lines", () => {
    expect(parseChatLine("random noise")).toBeNull();
    expect(parseChatLine("   ")).toBeNull();
  });

  test("should parse multi-line output and drop blanks", () => {
    const messages = parseChatLines("alice (Ally): hi\r\n\nSERVER: saved\nbob (Bobby): hey\n");
    expect(messages).toEqual([
      { player: "alice", character: "Ally", message: "hi" },
      { player: "SERVER", message: "saved" },
      { player: "bob", character: "Bobby", message: "hey" },
    ]);
  });
});
