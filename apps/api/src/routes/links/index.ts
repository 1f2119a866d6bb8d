/**
 * Link Routes
 *
 * Endpoints:
 *   POST /api/shorten   - Create a new short link
 *   GET  /:shortCode    - Redirect to the original URL
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import {
  InvalidCodeFormatError,
  NotFoundError,
  type ApiError,
  type ShortenResponse,
} from "@snaplink/shared";
import type { LinkService } from "../../services/index.js";
import { NOT_FOUND_PAGE } from "../../pages/not-found.js";
import { buildShortUrl } from "../short-url.js";

export interface LinksRoutesOptions {
  links: LinkService;
  baseUrl: string | null;
}

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

const shortenSchema = z.object({
  url: z.string().nullish(),
  custom_code: z.string().nullish(),
});

type ShortenBody = z.infer<typeof shortenSchema>;

type RedirectParams = { shortCode: string };

export const JSON_REQUIRED_MESSAGE = "Content-Type must be application/json";

function isJsonRequest(request: FastifyRequest): boolean {
  const contentType = request.headers["content-type"];
  return typeof contentType === "string" && contentType.toLowerCase().startsWith("application/json");
}

// ============================================================================
// Route Registration
// ============================================================================

export async function linksRoutes(fastify: FastifyInstance, options: LinksRoutesOptions): Promise<void> {
  const { links, baseUrl } = options;

  /**
   * POST /api/shorten - Create a short link
   *
   * Allocation errors propagate to the app error handler.
   */
  fastify.post("/api/shorten", async (request: FastifyRequest, reply: FastifyReply) => {
    if (!isJsonRequest(request)) {
      return reply.status(400).send({ success: false, error: JSON_REQUIRED_MESSAGE } satisfies ApiError);
    }

    const parseResult = shortenSchema.safeParse(request.body);
    if (!parseResult.success) {
      return reply.status(400).send({
        success: false,
        error: "Invalid request body",
        details: parseResult.error.flatten().fieldErrors,
      } satisfies ApiError);
    }

    const { url, custom_code }: ShortenBody = parseResult.data;
    const mapping = await links.shorten(url ?? "", custom_code);

    const body: ShortenResponse = {
      short_url: buildShortUrl(request, baseUrl, mapping.shortCode),
      short_code: mapping.shortCode,
      original_url: mapping.originalUrl,
      success: true,
    };
    return reply.status(200).send(body);
  });

  /**
   * GET /:shortCode - Redirect (302) and count the click
   */
  fastify.get(
    "/:shortCode",
    async (request: FastifyRequest<{ Params: RedirectParams }>, reply: FastifyReply) => {
      let destination: string;
      try {
        destination = await links.resolve(request.params.shortCode);
      } catch (err) {
        if (err instanceof InvalidCodeFormatError) {
          return reply.status(400).type("text/plain; charset=utf-8").send(err.message);
        }
        if (err instanceof NotFoundError) {
          return reply.status(404).type("text/html; charset=utf-8").send(NOT_FOUND_PAGE);
        }
        throw err;
      }

      return reply.redirect(destination);
    }
  );
}
