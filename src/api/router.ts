// pattern: Imperative Shell
import { router } from "./trpc";
import { revisionRouter } from "./routers/revision";
import { policyRouter } from "./routers/policy";

/**
 * Root tRPC router: revision status and acknowledgement, manual sync, and
 * alert policy.
 */
export const appRouter = router({
  revision: revisionRouter,
  policy: policyRouter,
});

export type AppRouter = typeof appRouter;
