import { Hono } from "hono";
import type { ConnectionRegistry } from "../conversations/ConnectionRegistry.js";

export interface HealthStatus {
  status: "healthy";
  timestamp: string;
  /** Open client sockets across all conversations */
  connections: number;
}

export function createHealthRoutes(
  connections: ConnectionRegistry,
  now: () => Date = () => new Date(),
): Hono {
  const routes = new Hono();

  routes.get("/", (c) => {
    const body: HealthStatus = {
      status: "healthy",
      timestamp: now().toISOString(),
      connections: connections.connectionCount(),
    };
    return c.json(body);
  });

  return routes;
}
