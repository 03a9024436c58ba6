import type { Request, Response, NextFunction } from "express";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { RefreshTokenRequestSchema, TokenRequestSchema } from "../validation/schemas";
import type { ApiRequest, ApiResponse } from "../routes/types";

// JWT Authentication Middleware
//
// Staff identify themselves with a staff id and a role. The role travels in
// the token and is checked per operation (diagnosis changes); the middleware
// only establishes who is calling.
//
// Access token: 15 minutes. Refresh token: 7 days.

const ACCESS_TOKEN_EXPIRY = "15m";
const REFRESH_TOKEN_EXPIRY = "7d";
const ACCESS_TOKEN_TTL_SECONDS = 900;

function jwtSecret(): string {
  return process.env.JWT_SECRET || "clinic-dev-secret-change-in-production";
}

const AuthPayloadSchema = z.object({
  staffId: z.string().min(1),
  role: z.string().min(1),
  type: z.enum(["access", "refresh"]).optional(),
  iat: z.number().optional(),
  exp: z.number().optional(),
});

export type AuthPayload = z.infer<typeof AuthPayloadSchema>;

declare global {
  namespace Express {
    interface Request {
      auth?: AuthPayload;
    }
  }
}

// --- Token generation ---

export function generateAccessToken(payload: { staffId: string; role: string }): string {
  return jwt.sign({ staffId: payload.staffId, role: payload.role, type: "access" }, jwtSecret(), {
    expiresIn: ACCESS_TOKEN_EXPIRY,
  });
}

export function generateRefreshToken(payload: { staffId: string; role: string }): string {
  return jwt.sign({ staffId: payload.staffId, role: payload.role, type: "refresh" }, jwtSecret(), {
    expiresIn: REFRESH_TOKEN_EXPIRY,
  });
}

export function verifyToken(token: string): AuthPayload {
  const decoded = jwt.verify(token, jwtSecret());
  const parsed = AuthPayloadSchema.safeParse(decoded);
  if (!parsed.success) throw new jwt.JsonWebTokenError("Token payload is not a staff identity.");
  return parsed.data;
}

// --- Middleware ---

const PUBLIC_PATHS = new Set(["/api/health", "/api/auth/token", "/api/auth/refresh"]);

export function authMiddleware(req: Request, res: Response, next: NextFunction): void {
  if (PUBLIC_PATHS.has(req.path)) {
    return next();
  }

  // Development mode: identity comes from headers, unverified.
  if (process.env.DISABLE_AUTH === "true") {
    const staffId = req.header("x-staff-id");
    const role = req.header("x-staff-role");
    if (staffId && role) {
      req.auth = { staffId, role };
    }
    return next();
  }

  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith("Bearer ")) {
    res.status(401).json({ error: "Missing or invalid Authorization header. Expected: Bearer <token>" });
    return;
  }

  const token = authHeader.slice(7);

  try {
    const payload = verifyToken(token);
    if (payload.type === "refresh") {
      res.status(401).json({ error: "Refresh tokens cannot be used for API calls." });
      return;
    }
    req.auth = payload;
    next();
  } catch (err) {
    if (err instanceof jwt.TokenExpiredError) {
      res.status(401).json({ error: "Token expired. Please refresh your token." });
    } else {
      res.status(401).json({ error: "Invalid token." });
    }
  }
}

// --- Staff roster ---
//
// STAFF_ROSTER="dr-001=chief,nurse-7=front-line". When set, tokens are issued
// (and refreshed) only for listed staff ids with the role the roster grants.
// When unset, roles are self-asserted by the caller.

function staffRoster(): ReadonlyMap<string, string> | undefined {
  const raw = process.env.STAFF_ROSTER;
  if (!raw) return undefined;

  const roster = new Map<string, string>();
  for (const entry of raw.split(",")) {
    const [staffId, role] = entry.split("=").map((part) => part.trim());
    if (staffId && role) roster.set(staffId, role);
  }
  return roster;
}

function isGranted(staffId: string, role: string): boolean {
  const roster = staffRoster();
  return !roster || roster.get(staffId) === role;
}

const ROLE_NOT_GRANTED = { error: "Role not granted to this staff member." };

// --- Token issuance endpoint handlers ---

export async function handleTokenRequest(req: ApiRequest, res: ApiResponse): Promise<void> {
  const parsed = TokenRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({ error: "Valid staffId (min 3 characters) and role required." });
    return;
  }

  const { staffId, role } = parsed.data;
  if (!isGranted(staffId, role)) {
    res.status(403).json(ROLE_NOT_GRANTED);
    return;
  }

  res.json({
    accessToken: generateAccessToken({ staffId, role }),
    refreshToken: generateRefreshToken({ staffId, role }),
    expiresIn: ACCESS_TOKEN_TTL_SECONDS,
  });
}

export async function handleTokenRefresh(req: ApiRequest, res: ApiResponse): Promise<void> {
  const parsed = RefreshTokenRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({ error: "refreshToken required." });
    return;
  }

  try {
    const payload = verifyToken(parsed.data.refreshToken);
    if (payload.type !== "refresh") {
      res.status(400).json({ error: "Invalid token type. Expected refresh token." });
      return;
    }

    if (!isGranted(payload.staffId, payload.role)) {
      res.status(403).json(ROLE_NOT_GRANTED);
      return;
    }

    const identity = { staffId: payload.staffId, role: payload.role };
    res.json({
      accessToken: generateAccessToken(identity),
      refreshToken: generateRefreshToken(identity),
      expiresIn: ACCESS_TOKEN_TTL_SECONDS,
    });
  } catch {
    res.status(401).json({ error: "Invalid or expired refresh token." });
  }
}
