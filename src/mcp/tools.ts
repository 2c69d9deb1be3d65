import { z } from "zod";

export interface ToolParam {
  type: "number" | "string";
  desc?: string;
  required?: boolean;
  default?: string | number;
}

export interface ToolDefinition {
  desc: string;
  rcon: string; // Template with {param} placeholders
  params: Record<string, ToolParam>;
}

// Single source of truth for the admin command tools
export const TOOLS: Record<string, ToolDefinition> = {
  // World
  save_world: {
    desc: "Save the current world to disk",
    rcon: "SaveWorld",
    params: {}
  },
  set_time_of_day: {
    desc: "Set the in-game time of day (HH:MM)",
    rcon: "SetTimeOfDay {time}",
    params: { time: { type: "string", desc: "Time as HH:MM, e.g. 08:00", required: true } }
  },
  destroy_wild_dinos: {
    desc: "Destroy all untamed creatures so they respawn",
    rcon: "DestroyWildDinos",
    params: {}
  },

  // Players
  list_players: {
    desc: "List connected players with their Steam IDs",
    rcon: "ListPlayers",
    params: {}
  },
  kick_player: {
    desc: "Kick a player by Steam ID",
    rcon: "KickPlayer {steamId}",
    params: { steamId: { type: "string", desc: "Player Steam ID", required: true } }
  },
  ban_player: {
    desc: "Ban a player by Steam ID",
    rcon: "BanPlayer {steamId}",
    params: { steamId: { type: "string", desc: "Player Steam ID", required: true } }
  },
  unban_player: {
    desc: "Lift a ban by Steam ID",
    rcon: "UnbanPlayer {steamId}",
    params: { steamId: { type: "string", desc: "Player Steam ID", required: true } }
  },

  // Chat
  broadcast: {
    desc: "Show a message on every player's screen",
    rcon: "Broadcast {message}",
    params: { message: { type: "string", desc: "Message to broadcast", required: true } }
  },
  server_chat: {
    desc: "Send a chat message as SERVER",
    rcon: "ServerChat {message}",
    params: { message: { type: "string", desc: "Message to send", required: true } }
  },
  get_chat: {
    desc: "Get chat messages since the last call",
    rcon: "GetChat",
    params: {}
  },

  // Server
  shutdown_server: {
    desc: "Save and shut the server down",
    rcon: "DoExit",
    params: {}
  },
};

export const SPECIAL_TOOLS = [
  {
    name: "rcon_execute",
    description: "Run a raw RCON command and return its output. Shell-special characters are stripped before sending.",
    inputSchema: {
      type: "object" as const,
      properties: {
        command: { type: "string", description: "Command text, e.g. 'ListPlayers'" }
      },
      required: ["command"]
    }
  }
];

// Handled on this host rather than over RCON
export const SERVER_TOOLS = [
  {
    name: "server_start",
    description: "Launch the dedicated server process with the configured map and ports.",
    inputSchema: { type: "object" as const, properties: {}, required: [] }
  },
  {
    name: "server_stop",
    description: "Stop the server process (SIGTERM, then SIGKILL after 30 seconds). Use save_world first.",
    inputSchema: { type: "object" as const, properties: {}, required: [] }
  },
  {
    name: "server_status",
    description: "Report whether the server is installed and whether this manager's process is running.",
    inputSchema: { type: "object" as const, properties: {}, required: [] }
  },
  {
    name: "create_backup",
    description: "Copy ShooterGame/Saved (saves, config, logs) into a timestamped backup directory.",
    inputSchema: { type: "object" as const, properties: {}, required: [] }
  },
  {
    name: "list_logs",
    description: "List the ten most recent server log files.",
    inputSchema: { type: "object" as const, properties: {}, required: [] }
  },
  {
    name: "tail_log",
    description: "Show the last lines of a server log (the most recent one by default).",
    inputSchema: {
      type: "object" as const,
      properties: {
        name: { type: "string", description: "Log file name from list_logs" },
        lines: { type: "number", description: "Number of lines (default 50)" }
      },
      required: []
    }
  }
];

export const RawCommandSchema = z.object({
  command: z.string().min(1),
});

export const TailLogSchema = z.object({
  name: z.string().min(1).optional(),
  lines: z.coerce.number().int().positive().max(1000).default(50),
});

// Generate MCP tool schemas from TOOLS
export function generateToolSchemas() {
  const toolSchemas = Object.entries(TOOLS).map(([name, tool]) => ({
    name,
    description: tool.desc,
    inputSchema: {
      type: "object" as const,
      properties: Object.fromEntries(
        Object.entries(tool.params).map(([pName, p]) => [
          pName,
          { type: p.type, description: p.desc }
        ])
      ),
      required: Object.entries(tool.params)
        .filter(([_, p]) => p.required)
        .map(([name]) => name)
    }
  }));

  return [...toolSchemas, ...SPECIAL_TOOLS, ...SERVER_TOOLS];
}

function paramSchema(param: ToolParam): z.ZodTypeAny {
  const base: z.ZodTypeAny = param.type === "number" ? z.coerce.number() : z.string().min(1);
  if (param.default !== undefined) return base.default(param.default);
  return param.required ? base : base.optional();
}

export function argsSchemaFor(tool: ToolDefinition) {
  return z.object(
    Object.fromEntries(Object.entries(tool.params).map(([name, p]) => [name, paramSchema(p)]))
  );
}

export function parseToolArgs(toolName: string, args: Record<string, unknown> = {}): Record<string, unknown> {
  const tool = TOOLS[toolName];
  if (!tool) throw new Error(`Unknown tool: ${toolName}`);

  const parsed = argsSchemaFor(tool).safeParse(args);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid arguments for ${toolName}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

// Build RCON command from template and args
export function buildRCONCommand(toolName: string, args: Record<string, unknown> = {}): string {
  const values = parseToolArgs(toolName, args);
  let cmd = TOOLS[toolName].rcon;

  for (const param of Object.keys(TOOLS[toolName].params)) {
    const value = values[param];
    cmd = cmd.replace(`{${param}}`, value === undefined ? "" : String(value));
  }

  // Clean up extra spaces
  return cmd.replace(/\s+/g, " ").trim();
}
