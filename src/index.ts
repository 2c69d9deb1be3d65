import { getRCONConfig, getServerConfig, validateRCONConfig } from "./config";
import { ArkMCPServer } from "./mcp/server";
import { RCONClient } from "./rcon/client";

async function main() {
  const config = getRCONConfig();
  validateRCONConfig(config);

  const server = new ArkMCPServer(config, new RCONClient(config), getServerConfig());

  const shutdown = () => {
    server.stop().then(
      () => process.exit(0),
      () => process.exit(1)
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  await server.start();
}

main().catch((error) => {
  console.error("❌ Failed to start server:", error instanceof Error ? error.message : error);
  process.exit(1);
});
