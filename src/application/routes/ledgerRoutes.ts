import { Router, type Request, type Response } from "express";
import type { LedgerController } from "@/infrastructure/controllers/ledgerController";

/**
 * Ledger HTTP routes.
 *
 * - `POST /api/ledger/commands` - run a command as the `x-actor-id` actor
 * - `GET /api/ledger/status` - control-plane status
 * - `GET /api/ledger/resources[/:id[/price-history]]` - pool queries
 * - `GET /api/ledger/requests[/:id]` - requests, filterable by requester and status
 * - `GET /api/ledger/balances/:actor` - balances by resource type
 * - `GET /api/ledger/actors/:actor` - role, tier and eligibility
 */
export function createLedgerRouter(controller: LedgerController): Router {
  const router = Router();

  router.get("/health", (req: Request, res: Response) =>
    controller.healthCheck(req, res),
  );
  router.post("/api/ledger/commands", (req: Request, res: Response) =>
    controller.executeCommand(req, res),
  );
  router.get("/api/ledger/status", (req: Request, res: Response) =>
    controller.getStatus(req, res),
  );
  router.get("/api/ledger/resources", (req: Request, res: Response) =>
    controller.listResources(req, res),
  );
  router.get("/api/ledger/resources/:id", (req: Request, res: Response) =>
    controller.getResource(req, res),
  );
  router.get(
    "/api/ledger/resources/:id/price-history",
    (req: Request, res: Response) => controller.getPriceHistory(req, res),
  );
  router.get("/api/ledger/requests", (req: Request, res: Response) =>
    controller.listRequests(req, res),
  );
  router.get("/api/ledger/requests/:id", (req: Request, res: Response) =>
    controller.getRequest(req, res),
  );
  router.get("/api/ledger/balances/:actor", (req: Request, res: Response) =>
    controller.getBalances(req, res),
  );
  router.get("/api/ledger/actors/:actor", (req: Request, res: Response) =>
    controller.getActor(req, res),
  );

  return router;
}
