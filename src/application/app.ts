import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from "express";
import cors from "cors";
import { createLedgerRouter } from "./routes/ledgerRoutes";
import { container } from "../config/container";
import { CONFIG } from "../config/config";
import { TYPES } from "../config/Types";
import type { LedgerController } from "../infrastructure/controllers/ledgerController";
import { logger, LogCategory } from "../infrastructure/utils/logger";
import { HttpStatusCode } from "../shared/constants/HttpStatusCodes";

/**
 * Express application.
 *
 * Routes:
 * - `/health` - liveness and current block
 * - `/api/ledger` - commands and read queries
 *
 * @module application
 */
export function createApp(controller: LedgerController): Express {
  const app = express();

  app.use(
    cors({
      origin: CONFIG.ALLOWED_ORIGINS,
      credentials: true,
    }),
  );

  app.use(express.json({ limit: "1mb" }));

  if (process.env.NODE_ENV !== "production") {
    app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.path}`, LogCategory.HTTP);
      next();
    });
  }

  app.use("/", createLedgerRouter(controller));

  app.use(
    (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
      // body-parser tags malformed JSON with a 4xx status
      if ("status" in err && typeof err.status === "number" && err.status < 500) {
        res.status(err.status).json({ error: "INVALID_BODY", message: err.message });
        return;
      }
      const errorMessage =
        process.env.NODE_ENV === "production"
          ? "Internal server error"
          : err.message;
      logger.error("Unhandled error:", LogCategory.HTTP, err.message);
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ error: errorMessage });
    },
  );

  app.use((_req: Request, res: Response): void => {
    res.status(HttpStatusCode.NOT_FOUND).json({ error: "Route not found" });
  });

  return app;
}

const app = createApp(container.get<LedgerController>(TYPES.LedgerController));

export default app;
