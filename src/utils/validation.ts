export const DEFAULT_GAME_PORT = 7777;
export const DEFAULT_QUERY_PORT = 27015;
export const DEFAULT_RCON_PORT = 27020;

export const MAX_INPUT_LENGTH = 512;
export const MIN_PASSWORD_LENGTH = 8;
export const MAX_PASSWORD_LENGTH = 128;

const DANGEROUS_CHARS = /[&|;$`\n\r<>"']/g;

// Strip characters that could change how the server or a shell reads the text
export function sanitizeInput(value: string, maxLength: number = MAX_INPUT_LENGTH): string {
  // Truncate by code point so a surrogate pair is never split
  return Array.from(value.replace(DANGEROUS_CHARS, "").trim()).slice(0, maxLength).join("");
}

export function validatePort(port: number): number {
  if (!Number.isInteger(port) || port < 1024 || port > 65535) {
    throw new RangeError(`Port must be between 1024 and 65535, got ${port}`);
  }
  return port;
}

export function validateStrongPassword(password: string): boolean {
  if (password.length < MIN_PASSWORD_LENGTH || password.length > MAX_PASSWORD_LENGTH) {
    return false;
  }
  return password.trim().length > 0;
}
