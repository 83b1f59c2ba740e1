/** Env var validation with fail-fast. Never logs actual values. */

type Env = Record<string, string | undefined>;

function required(env: Env, name: string, fallback?: string): string {
  const val = env[name] || fallback;
  if (!val) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return val;
}

function optional(env: Env, name: string): string | undefined {
  return env[name] || undefined;
}

export type ServerEnv = {
  port: number;
  host: string;
  requestLogging: boolean;
};

/** Server env vars. Throws on missing or malformed values. */
export function getServerEnv(env: Env = process.env): ServerEnv {
  const rawPort = required(env, "PORT", "8000");
  const port = Number(rawPort);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid env var PORT: expected an integer between 1 and 65535`);
  }

  return {
    port,
    host: required(env, "HOST", "0.0.0.0"),
    requestLogging: optional(env, "REQUEST_LOGGING")?.toLowerCase() !== "false",
  };
}
