/**
 * Event log routes.
 *
 * GET /api/v1/events — Transfer and Approval events in sequence order
 *                      (cursor pagination)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { decodeCursor, paginate } from "../types/pagination.js";
import { requirePermission } from "../middleware/auth.js";
import { parseQuery } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/events", requirePermission("read"), (c) => {
    const query = parseQuery(c, ListEventsQuerySchema);

    // Read only the page after the cursor, plus one to detect more
    const after = query.cursor === undefined ? undefined : decodeCursor(query.cursor);
    const fromSequence = after !== undefined && after.field === "sequence" ? after.value + 1 : 1;
    const events = c.get("service").events({ fromSequence, maxCount: query.limit + 1 });

    const result = paginate(
      events,
      { cursor: query.cursor, limit: query.limit },
      (e) => e.sequence,
      "sequence",
    );
    return c.json(result);
  });

  return routes;
}
