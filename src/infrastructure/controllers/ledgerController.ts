import { injectable, inject } from "inversify";
import type { Request, Response } from "express";
import { TYPES } from "../../config/Types";
import type { LedgerClock } from "../../domain/ledger/core/LedgerClock";
import { LedgerCommandProcessor } from "../../domain/ledger/core/runner/LedgerCommandProcessor";
import { parseLedgerCommand } from "../../domain/ledger/core/runner/CommandValidator";
import {
  AccessResolver,
  AllocationRequestEngine,
  BalanceLedger,
  ControlPlane,
  ResourcePoolRegistry,
} from "../../domain/ledger/systems";
import { AllocationErrorCode } from "../../domain/ledger/errors/AllocationError";
import type { RequestFilter } from "../../domain/types/ledger";
import { RequestStatus } from "../../shared/constants/LedgerEnums";
import { HttpStatusCode } from "../../shared/constants/HttpStatusCodes";
import { ResponseStatus } from "../../shared/constants/ResponseEnums";
import { logger, LogCategory } from "../utils/logger";

export const ACTOR_HEADER = "x-actor-id";

const REQUEST_STATUSES: readonly RequestStatus[] = Object.values(RequestStatus);

/**
 * HTTP status for a ledger error code.
 */
export function httpStatusForError(code: AllocationErrorCode): HttpStatusCode {
  switch (code) {
    case AllocationErrorCode.UNAUTHORIZED_ACCESS:
      return HttpStatusCode.FORBIDDEN;
    case AllocationErrorCode.RESOURCE_TYPE_NOT_FOUND:
      return HttpStatusCode.NOT_FOUND;
    case AllocationErrorCode.ALREADY_INITIALIZED:
      return HttpStatusCode.CONFLICT;
    default:
      return HttpStatusCode.BAD_REQUEST;
  }
}

function readCaller(req: Request): string | undefined {
  const header = req.headers?.[ACTOR_HEADER];
  if (typeof header !== "string") return undefined;
  const caller = header.trim();
  return caller.length > 0 ? caller : undefined;
}

function readIdParam(req: Request): number | undefined {
  const id = Number(req.params?.id);
  return Number.isSafeInteger(id) ? id : undefined;
}

function readQueryString(req: Request, key: string): string | undefined {
  const value = req.query?.[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * HTTP adapter over the ledger. Mutations go through the command processor;
 * reads call the systems' query methods directly.
 */
@injectable()
export class LedgerController {
  constructor(
    @inject(TYPES.LedgerCommandProcessor)
    private readonly processor: LedgerCommandProcessor,
    @inject(TYPES.ControlPlane) private readonly control: ControlPlane,
    @inject(TYPES.ResourcePoolRegistry)
    private readonly registry: ResourcePoolRegistry,
    @inject(TYPES.AllocationRequestEngine)
    private readonly requests: AllocationRequestEngine,
    @inject(TYPES.BalanceLedger) private readonly balances: BalanceLedger,
    @inject(TYPES.AccessResolver) private readonly access: AccessResolver,
    @inject(TYPES.LedgerClock) private readonly clock: LedgerClock,
  ) {}

  healthCheck(_req: Request, res: Response): void {
    res.json({ status: ResponseStatus.OK, block: this.clock.now() });
  }

  /**
   * Runs one command on behalf of the actor named in the `x-actor-id` header.
   */
  executeCommand(req: Request, res: Response): void {
    const caller = readCaller(req);
    if (!caller) {
      res.status(HttpStatusCode.UNAUTHORIZED).json({
        error: "MISSING_ACTOR",
        message: `${ACTOR_HEADER} header is required`,
      });
      return;
    }

    const parsed = parseLedgerCommand(req.body);
    if (!parsed.valid) {
      res
        .status(HttpStatusCode.BAD_REQUEST)
        .json({ error: "INVALID_COMMAND", message: parsed.reason });
      return;
    }

    try {
      const outcome = this.processor.execute(caller, parsed.command);
      if (outcome.ok) {
        res.json(outcome);
        return;
      }
      res
        .status(httpStatusForError(outcome.error.code))
        .json({ error: outcome.error.code, message: outcome.error.message });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : "Unknown error";
      logger.error("Error executing ledger command:", LogCategory.HTTP, errorMessage);
      res
        .status(HttpStatusCode.INTERNAL_SERVER_ERROR)
        .json({ error: "INTERNAL_ERROR", message: "Failed to execute command" });
    }
  }

  getStatus(_req: Request, res: Response): void {
    res.json({ ...this.control.getStatus(), block: this.clock.now() });
  }

  listResources(_req: Request, res: Response): void {
    res.json({ resources: this.registry.listResourceTypes() });
  }

  getResource(req: Request, res: Response): void {
    const id = readIdParam(req);
    if (id === undefined) {
      this.invalidParameter(res, "id");
      return;
    }
    const record = this.registry.getResourceType(id);
    if (!record) {
      this.resourceNotFound(res, id);
      return;
    }
    res.json(record);
  }

  getPriceHistory(req: Request, res: Response): void {
    const id = readIdParam(req);
    if (id === undefined) {
      this.invalidParameter(res, "id");
      return;
    }
    if (!this.registry.getResourceType(id)) {
      this.resourceNotFound(res, id);
      return;
    }
    res.json({ resourceTypeId: id, history: this.registry.getPriceHistory(id) });
  }

  listRequests(req: Request, res: Response): void {
    const filter: RequestFilter = {};

    const requester = readQueryString(req, "requester");
    if (requester !== undefined) filter.requester = requester;

    const rawStatus = readQueryString(req, "status");
    if (rawStatus !== undefined) {
      const status = REQUEST_STATUSES.find((candidate) => candidate === rawStatus);
      if (!status) {
        this.invalidParameter(res, "status");
        return;
      }
      filter.status = status;
    }

    const rawType = readQueryString(req, "resourceTypeId");
    if (rawType !== undefined) {
      const resourceTypeId = Number(rawType);
      if (!Number.isSafeInteger(resourceTypeId)) {
        this.invalidParameter(res, "resourceTypeId");
        return;
      }
      filter.resourceTypeId = resourceTypeId;
    }

    res.json({ requests: this.requests.listRequests(filter) });
  }

  getRequest(req: Request, res: Response): void {
    const id = readIdParam(req);
    if (id === undefined) {
      this.invalidParameter(res, "id");
      return;
    }
    const request = this.requests.getRequest(id);
    if (!request) {
      res
        .status(HttpStatusCode.NOT_FOUND)
        .json({ error: "REQUEST_NOT_FOUND", message: `Request ${id} not found` });
      return;
    }
    res.json(request);
  }

  getBalances(req: Request, res: Response): void {
    const actor = req.params?.actor ?? "";
    res.json({
      actor,
      balances: this.balances.getBalances(actor),
      total: this.balances.getTotalBalance(actor),
    });
  }

  getActor(req: Request, res: Response): void {
    res.json(this.access.getActorProfile(req.params?.actor ?? ""));
  }

  private invalidParameter(res: Response, name: string): void {
    res
      .status(HttpStatusCode.BAD_REQUEST)
      .json({ error: "INVALID_PARAMETER", message: `Invalid ${name}` });
  }

  private resourceNotFound(res: Response, id: number): void {
    res.status(HttpStatusCode.NOT_FOUND).json({
      error: AllocationErrorCode.RESOURCE_TYPE_NOT_FOUND,
      message: `Resource type ${id} not found`,
    });
  }
}
