import { initTRPC } from "@trpc/server";
import { FeedFetchError } from "../errors";
import type { AppContext } from "./context";

const t = initTRPC.context<AppContext>().create({
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        fetchErrorKind:
          error.cause instanceof FeedFetchError ? error.cause.kind : null,
      },
    };
  },
});

export const router = t.router;

export const publicProcedure = t.procedure;

/**
 * Calls procedures directly without HTTP transport, for tests.
 */
export const createCallerFactory = t.createCallerFactory;
