export type RateLimitPolicy = "empty" | "drop";

export type LogLevel = "quiet" | "verbose";

export type GatewayConfig = {
  dnsHost: string;
  dnsPort: number;
  httpHost: string;
  httpPort: number; // 0 disables the HTTP surface
  ttlS: number;
  maxChars: number;
  deadlineMs: number;
  domainSuffix: string;
  maxUdpPayload: number;
  llm: {
    protocol: string;
    host: string;
    port: number;
    model: string;
    ellipsis: boolean;
  };
  rateLimit: {
    capacity: number;
    refillPerSec: number;
    policy: RateLimitPolicy;
  };
  logLevel: LogLevel;
};

export function loadConfig(env: Record<string, string | undefined> = process.env): GatewayConfig {
  return {
    dnsHost: env.DNS_HOST || "0.0.0.0",
    // 53 requires root; 5353 for development
    dnsPort: int(env.DNS_PORT, 5353),
    httpHost: env.HTTP_HOST || "127.0.0.1",
    httpPort: int(env.HTTP_PORT, 8055),
    ttlS: int(env.DNS_TTL_S, 60),
    maxChars: positive(env.MAX_CHARS, 500),
    deadlineMs: positive(env.DEADLINE_MS, 4000),
    domainSuffix: env.DOMAIN_SUFFIX ?? ".example.test",
    maxUdpPayload: Math.max(512, Math.min(65535, int(env.MAX_UDP_PAYLOAD, 1232))),
    llm: {
      protocol: env.LLM_PROTOCOL || "http",
      host: env.LLM_HOST || "127.0.0.1",
      port: int(env.LLM_PORT, 11434),
      model: env.LLM_MODEL || "llama3.2",
      ellipsis: env.LLM_ELLIPSIS === "1"
    },
    rateLimit: {
      capacity: positive(env.RATE_LIMIT_CAPACITY, 60),
      refillPerSec: positive(env.RATE_LIMIT_REFILL_PER_SEC, 1),
      policy: parseRateLimitPolicy(env.RATE_LIMIT_POLICY || "empty")
    },
    logLevel: parseLogLevel(env.LOG_LEVEL || (env.NODE_ENV === "development" ? "verbose" : "quiet"))
  };
}

export function parseRateLimitPolicy(value: string): RateLimitPolicy {
  const v = value.trim().toLowerCase();
  if (v === "empty" || v === "drop") return v;
  throw new Error("INVALID_RATE_LIMIT_POLICY");
}

function parseLogLevel(value: string): LogLevel {
  return value.trim().toLowerCase() === "verbose" ? "verbose" : "quiet";
}

function int(v: string | undefined, def: number): number {
  const n = Number(v);
  return v !== undefined && v !== "" && Number.isInteger(n) && n >= 0 ? n : def;
}

function positive(v: string | undefined, def: number): number {
  const n = Number(v);
  return v !== undefined && v !== "" && Number.isFinite(n) && n > 0 ? n : def;
}
