/**
 * Fastify Application
 *
 * Builds the HTTP surface over an already-open store. `index.ts` owns the
 * process lifecycle; tests call `buildApp` directly and use `inject()`.
 */

import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import {
  AllocationExhaustedError,
  NotFoundError,
  isClientError,
  type ApiError,
  type RandomSource,
} from "@snaplink/shared";
import type { AliasStore } from "@snaplink/db";
import type { Config } from "./config.js";
import { AliasAllocator, LinkService } from "./services/index.js";
import { JSON_REQUIRED_MESSAGE, linksRoutes } from "./routes/links/index.js";
import { statsRoutes } from "./routes/stats.js";
import { healthRoutes } from "./routes/health.js";

export interface AppOptions {
  config: Config;
  store: AliasStore;
  /** Symbol source for generated codes (defaults to the CSPRNG) */
  random?: RandomSource;
}

function errorBody(error: string): ApiError {
  return { success: false, error };
}

export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const { config, store } = options;

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      transport:
        config.nodeEnv === "development"
          ? {
              target: "pino-pretty",
              options: { colorize: true },
            }
          : undefined,
    },
    trustProxy: true,
    requestIdHeader: "x-request-id",
  });

  const allocator = new AliasAllocator(store, {
    maxAttempts: config.allocationMaxAttempts,
    random: options.random,
  });
  const links = new LinkService(store, allocator);

  // ==========================================================================
  // Error Handling
  // ==========================================================================

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    if (error.code === "FST_ERR_CTP_INVALID_MEDIA_TYPE") {
      return reply.status(400).send(errorBody(JSON_REQUIRED_MESSAGE));
    }

    if (error.validation) {
      return reply.status(400).send({
        success: false,
        error: "Validation error",
        details: { validation: error.validation },
      } satisfies ApiError);
    }

    if (isClientError(error)) {
      return reply.status(400).send(errorBody(error.message));
    }

    if (error instanceof NotFoundError) {
      return reply.status(404).send(errorBody(error.message));
    }

    if (error instanceof AllocationExhaustedError) {
      request.log.warn({ attempts: error.attempts }, "Allocation exhausted");
      return reply.status(503).send(errorBody(error.message));
    }

    // Framework errors for malformed requests (bad JSON, oversized body)
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send(errorBody(error.message));
    }

    request.log.error({ err: error }, "Request error");
    return reply.status(500).send(errorBody("Internal server error"));
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.status(404).send(errorBody("Endpoint not found"));
  });

  // ==========================================================================
  // Plugins and Routes
  // ==========================================================================

  await fastify.register(cors, {
    origin: config.corsOrigin,
  });

  await fastify.register(healthRoutes, { links });
  await fastify.register(statsRoutes, { links, baseUrl: config.baseUrl });
  await fastify.register(linksRoutes, { links, baseUrl: config.baseUrl });

  return fastify;
}
