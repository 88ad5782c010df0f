// pattern: Imperative Shell
import express from "express";
import { createExpressMiddleware } from "@trpc/server/adapters/express";
import { appRouter } from "./router";
import type { AppContext } from "./context";

/**
 * Creates the Express app with the tRPC router at `/api/trpc` and a
 * `/health` endpoint that also reports whether a sync is running.
 *
 * @param context - Shared context handed to every procedure
 * @returns Configured Express app (not listening yet)
 */
export function createApiServer(context: AppContext): express.Express {
  const app = express();

  app.use(
    "/api/trpc",
    createExpressMiddleware({
      router: appRouter,
      createContext: () => context,
    }),
  );

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", syncing: context.scheduler.isRunning() });
  });

  return app;
}
