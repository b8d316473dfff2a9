/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { TokenService } from "../services/token-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The token service (set for every /api/* request) */
    service: TokenService;

    /** Caller identity (set by auth middleware, or anonymous in unsecured mode) */
    auth: AuthContext;
  };
}
