import { ChatMessage } from "./types";

// Reply an ARK server gives to a command with no output
export const NO_RESPONSE_TEXT = "Server received, But no response!!";

export function parseChatLine(line: string): ChatMessage | null {
  const text = line.trim();
  if (!text || text.startsWith(NO_RESPONSE_TEXT)) return null;

  const playerMatch = text.match(/^(.+?) \((.+?)\): (.*)$/);
  if (playerMatch) {
    return {
      player: playerMatch[1],
      character: playerMatch[2],
      message: playerMatch[3],
    };
  }

  const serverMatch = text.match(/^SERVER: (.*)$/);
  if (serverMatch) {
    return { player: "SERVER", message: serverMatch[1] };
  }

  return null;
}

export function parseChatLines(output: string): ChatMessage[] {
  return output
    .split(/\r?\n/)
    .map(parseChatLine)
    .filter((msg): msg is ChatMessage => msg !== null);
}
