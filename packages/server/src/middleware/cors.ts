import type { MiddlewareHandler } from "hono";
import { cors } from "hono/cors";

/**
 * CORS for the HTTP API. `["*"]` allows any origin; otherwise only the
 * listed origins are echoed back.
 */
export function createCorsMiddleware(origins: string[]): MiddlewareHandler {
  const allowAny = origins.includes("*");
  return cors({
    origin: allowAny
      ? "*"
      : (origin) => (origins.includes(origin) ? origin : null),
    credentials: !allowAny,
    allowMethods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowHeaders: ["Content-Type", "Authorization"],
  });
}
