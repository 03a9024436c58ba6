import type { Request, Response, NextFunction } from "express";
import type { AuthPayload } from "../middleware/auth";

// The slice of Express request/response the route handlers use.
// Express's own objects satisfy these structurally.

export interface ApiRequest {
  readonly params: Record<string, string>;
  readonly query: Record<string, unknown>;
  readonly body: unknown;
  readonly auth?: AuthPayload;
}

export interface ApiResponse {
  status(code: number): ApiResponse;
  json(body: unknown): unknown;
}

export type ApiHandler = (req: ApiRequest, res: ApiResponse) => Promise<void>;

// ---- Async error wrapper ----
export function asyncHandler(fn: ApiHandler) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}
