// Simple test script to verify RCON connection
// Run with: npm run rcon:test

import { getRCONConfig, validateRCONConfig } from "../config";
import { RCONClient } from "./client";

async function testConnection() {
  console.log("🧪 Testing RCON connection...\n");

  const config = getRCONConfig();
  validateRCONConfig(config);
  const client = new RCONClient(config);

  console.log(`📡 Connecting to ${config.host}:${config.port}...`);
  if (!(await client.connect())) {
    console.log("\n💡 Make sure:");
    console.log("   1. The server is running");
    console.log("   2. RCONEnabled=True is set in GameUserSettings.ini");
    console.log(`   3. RCONPort is ${config.port} (or set ARK_RCON_PORT)`);
    console.log("   4. ARK_RCON_PASSWORD matches ServerAdminPassword");
    process.exit(1);
  }

  console.log("\n✅ Connection successful!");
  console.log("\n📤 Sending test command: ListPlayers");

  const response = await client.execute("ListPlayers");

  if (response.success) {
    console.log("📥 Response:", response.data || "(no output)");
    console.log("\n✅ RCON is working!");
  } else {
    console.log("❌ Command failed:", response.error);
  }

  client.disconnect();
  console.log("\n👋 Disconnected");

  if (!response.success) process.exit(1);
}

testConnection().catch((error) => {
  console.error("\n❌ Connection test failed:", error instanceof Error ? error.message : error);
  process.exit(1);
});
