import type { FastifyRequest } from "fastify";

/**
 * Public URL for a short code: `BASE_URL/<code>` when configured,
 * otherwise the protocol and host the request arrived on.
 */
export function buildShortUrl(request: FastifyRequest, baseUrl: string | null, shortCode: string): string {
  const base = baseUrl ?? `${request.protocol}://${request.hostname}`;
  return `${base}/${shortCode}`;
}
