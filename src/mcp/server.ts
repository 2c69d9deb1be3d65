import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { parseChatLines } from "../chat/parser";
import { getServerConfig, ServerConfig } from "../config";
import { errorMessage, RCONClient } from "../rcon/client";
import { RCONConfig, RCONResponse } from "../rcon/types";
import { createBackup } from "../server/backup";
import { formatLogList, listLogs, resolveLogName, tailLog } from "../server/logs";
import { ControlResult, ServerController } from "../server/process";
import { connectWithRetry } from "../utils/connection";
import { buildRCONCommand, generateToolSchemas, RawCommandSchema, TailLogSchema, TOOLS } from "./tools";

const CHAT_POLL_INTERVAL = 3000;

function textResult(text: string, isError = false) {
  return {
    content: [{ type: "text" as const, text }],
    isError,
  };
}

export class ArkMCPServer {
  private server: Server;
  private rcon: RCONClient;
  private config: RCONConfig;
  private serverConfig: ServerConfig;
  private controller: ServerController;
  private pollingInterval?: NodeJS.Timeout;
  // One request in flight per connection: tool calls and chat polling share it
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    rconConfig: RCONConfig,
    rcon: RCONClient = new RCONClient(rconConfig),
    serverConfig: ServerConfig = getServerConfig(),
    controller: ServerController = new ServerController(serverConfig)
  ) {
    this.server = new Server(
      {
        name: "ark-rcon-manager",
        version: "0.1.0",
      },
      {
        capabilities: {
          tools: {},
          logging: {},
        },
      }
    );

    this.config = rconConfig;
    this.rcon = rcon;
    this.serverConfig = serverConfig;
    this.controller = controller;
    this.setupHandlers();
  }

  /** Runs a command after any queued ones, reconnecting first if the session was lost. */
  execute(command: string): Promise<RCONResponse> {
    const run = async (): Promise<RCONResponse> => {
      if (!this.rcon.isAuthenticated()) {
        try {
          await connectWithRetry(this.rcon);
        } catch (error) {
          return { success: false, error: `Not connected and reconnect failed: ${errorMessage(error)}` };
        }
      }

      const response = await this.rcon.execute(command);
      if (!response.success) {
        // Framing state is unknown after a failed read; start clean next time
        this.rcon.disconnect();
      }
      return response;
    };

    const next = this.queue.then(run, run);
    this.queue = next;
    return next;
  }

  async callTool(toolName: string, args: Record<string, unknown> = {}) {
    const local = await this.callServerTool(toolName, args);
    if (local) return local;

    let command: string;

    if (toolName === "rcon_execute") {
      const parsed = RawCommandSchema.safeParse(args);
      if (!parsed.success) {
        return textResult("Error: rcon_execute requires a non-empty 'command' string", true);
      }
      command = parsed.data.command;
    } else if (TOOLS[toolName]) {
      try {
        command = buildRCONCommand(toolName, args);
      } catch (error) {
        return textResult(`Error: ${errorMessage(error)}`, true);
      }
    } else {
      throw new Error(`Unknown tool: ${toolName}`);
    }

    const response = await this.execute(command);
    return response.success
      ? textResult(response.data || "OK")
      : textResult(`Error: ${response.error}`, true);
  }

  /** Tools that act on this host (process, backups, logs) instead of over RCON. */
  private async callServerTool(toolName: string, args: Record<string, unknown>) {
    const fromControl = (result: ControlResult) =>
      result.success ? textResult(result.message) : textResult(`Error: ${result.error}`, true);

    switch (toolName) {
      case "server_start":
        return fromControl(await this.controller.start());

      case "server_stop":
        this.rcon.disconnect();
        return fromControl(await this.controller.stop());

      case "server_status": {
        const status = {
          installed: await this.controller.isInstalled(),
          running: this.controller.isRunning(),
          pid: this.controller.getPid() ?? null,
          rconAuthenticated: this.rcon.isAuthenticated(),
        };
        return textResult(JSON.stringify(status, null, 2));
      }

      case "create_backup": {
        const result = await createBackup(this.serverConfig.serverDir, this.serverConfig.backupDir);
        return result.success
          ? textResult(`Backup created: ${result.path} (${(result.sizeBytes / (1024 * 1024)).toFixed(2)} MB)`)
          : textResult(`Error: ${result.error}`, true);
      }

      case "list_logs": {
        const files = await listLogs(this.serverConfig.serverDir);
        return textResult(files.length > 0 ? formatLogList(files) : "No log files found");
      }

      case "tail_log": {
        const parsed = TailLogSchema.safeParse(args);
        if (!parsed.success) {
          return textResult("Error: tail_log takes an optional 'name' and 'lines' between 1 and 1000", true);
        }

        let path: string | null;
        if (parsed.data.name) {
          path = resolveLogName(this.serverConfig.serverDir, parsed.data.name);
          if (!path) return textResult(`Error: invalid log name ${parsed.data.name}`, true);
        } else {
          const [newest] = await listLogs(this.serverConfig.serverDir, 1);
          if (!newest) return textResult("No log files found");
          path = newest.path;
        }

        try {
          const lines = await tailLog(path, parsed.data.lines);
          return textResult(lines.join("\n") || "(empty log)");
        } catch (error) {
          return textResult(`Error: could not read log: ${errorMessage(error)}`, true);
        }
      }

      default:
        return null;
    }
  }

  private setupHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: generateToolSchemas(),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      this.callTool(request.params.name, request.params.arguments)
    );
  }

  async checkForMessages() {
    const response = await this.execute("GetChat");
    if (!response.success) {
      console.error(`❌ Chat poll failed: ${response.error}`);
      return;
    }

    const messages = parseChatLines(response.data);
    for (const msg of messages) {
      await this.server.notification({
        method: "notifications/message",
        params: {
          level: "info",
          logger: "ark-chat",
          data: msg,
        },
      });
    }

    if (messages.length > 0) {
      console.error(`Sent ${messages.length} notification(s)`);
    }
  }

  private startPolling() {
    console.error(`Starting chat polling (every ${CHAT_POLL_INTERVAL / 1000} seconds)...`);

    this.pollingInterval = setInterval(() => {
      this.checkForMessages().catch((error) => {
        console.error("❌ Chat poll error:", errorMessage(error));
      });
    }, CHAT_POLL_INTERVAL);
  }

  async start(transport: Transport = new StdioServerTransport()) {
    console.error("Starting ARK RCON MCP Server...");

    if (!(await this.rcon.connect())) {
      throw new Error(
        `❌ Cannot connect to ARK RCON (${this.config.host}:${this.config.port})\n\n` +
        `Make sure:\n` +
        `1. The server is running\n` +
        `2. RCONEnabled=True and RCONPort=${this.config.port} are set in GameUserSettings.ini\n` +
        `3. ARK_RCON_PASSWORD matches ServerAdminPassword`
      );
    }
    console.error("RCON connected");

    await this.server.connect(transport);
    console.error("MCP server running");

    this.startPolling();
  }

  async stop() {
    if (this.pollingInterval) {
      clearInterval(this.pollingInterval);
    }
    await this.queue;
    this.rcon.disconnect();
    await this.server.close();
  }
}
