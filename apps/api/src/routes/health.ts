/**
 * Health Check Route
 *
 * Readiness of the process and its store; 503 when the store does not
 * answer a trivial query.
 */

import type { FastifyInstance } from "fastify";
import type { HealthCheckResponse } from "@snaplink/shared";
import type { LinkService } from "../services/index.js";

export interface HealthRoutesOptions {
  links: LinkService;
}

export async function healthRoutes(fastify: FastifyInstance, options: HealthRoutesOptions): Promise<void> {
  fastify.get("/health", async (request, reply) => {
    const healthy = await options.links.isHealthy();

    const body: HealthCheckResponse = {
      status: healthy ? "healthy" : "unhealthy",
      timestamp: new Date().toISOString(),
      database: healthy ? "connected" : "disconnected",
    };

    if (!healthy) {
      request.log.warn("Health check failed: store unreachable");
    }
    return reply.status(healthy ? 200 : 503).send(body);
  });
}
