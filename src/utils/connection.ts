import { RCONClient } from "../rcon/client";

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export async function connectWithRetry(
  client: RCONClient,
  maxRetries: number = 3,
  initialDelay: number = 1000
): Promise<void> {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    if (await client.connect()) {
      console.error(`✅ RCON connected on attempt ${attempt}`);
      return;
    }

    console.error(`❌ RCON connection attempt ${attempt}/${maxRetries} failed`);

    if (attempt === maxRetries) {
      throw new Error(`Failed to connect after ${maxRetries} attempts`);
    }

    // Exponential backoff: 1s, 2s, 4s, 8s, etc.
    await sleep(initialDelay * Math.pow(2, attempt - 1));
  }
}
