/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { WrapperService } from "../services/wrapper-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Set by request-id middleware */
    requestId: string;

    service: WrapperService;

    /** Set by auth middleware */
    auth: AuthContext;
  };
}
