/**
 * Event query routes.
 *
 * GET /api/v1/events?type=&after=&limit= — Wrapper events in sequence order
 *
 * Pagination is by sequence: pass the last `sequence` seen as `after`.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema, toEventDto } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const service = c.get("service");

    const queryResult = ListEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const query = queryResult.data;
    // One extra row tells us whether another page exists.
    const events = service.events({
      type: query.type,
      after: query.after,
      limit: query.limit + 1,
    });

    const page = events.slice(0, query.limit).map(toEventDto);
    const hasMore = events.length > query.limit;
    const last = page.at(-1);

    return c.json({
      data: page,
      pagination: {
        hasMore,
        nextAfter: hasMore && last !== undefined ? last.sequence : null,
      },
    });
  });

  return routes;
}
