/**
 * What route handlers receive: the conductor and ledger built at startup,
 * plus the narrow request/response surface the handlers use.
 */

import type { ZodError } from "zod";
import type { Conductor } from "../src/conductor.js";
import { errorMessage } from "../src/errors.js";
import type { LedgerStore } from "../src/lib/ledger/types.js";

export interface ApiContext {
  conductor: Conductor;
  ledger: LedgerStore;
}

export interface ApiRequest {
  body: unknown;
  params: Record<string, string>;
  query: Record<string, unknown>;
}

export interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
}

export type ApiHandler = (req: ApiRequest, res: JsonResponse) => Promise<void>;

export function sendInvalid(res: JsonResponse, error: ZodError): void {
  res.status(400).json({
    error: "Invalid request body",
    issues: error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
  });
}

export function sendServerError(res: JsonResponse, scope: string, e: unknown): void {
  const message = errorMessage(e);
  console.error(`[Server] ${scope} failed:`, message);
  res.status(500).json({ error: message });
}
