import type { Request, Response, NextFunction } from "express";
import { parse as parseCookies } from "cookie";
import { parseSessionToken, SESSION_COOKIE, type UserContext } from "./auth.js";
import { unauthorizedError } from "../engine/errors.js";

declare global {
  namespace Express {
    interface Request {
      user?: UserContext;
    }
  }
}

/** Session token from an "Authorization: Bearer" header, else from the session cookie. */
export function readSessionToken(req: Request): string | undefined {
  const header = req.headers.authorization;
  if (header) {
    const parts = header.split(" ");
    if (parts.length === 2 && parts[0].toLowerCase() === "bearer") {
      return parts[1];
    }
  }
  const cookies = parseCookies(req.headers.cookie ?? "");
  return cookies[SESSION_COOKIE] || undefined;
}

export function authMiddleware(secret: string) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const token = readSessionToken(req);
    if (!token) {
      return next(unauthorizedError("Authentication required"));
    }

    try {
      const claims = parseSessionToken(token, secret);
      req.user = { username: claims.sub };
      next();
    } catch {
      next(unauthorizedError("Invalid or expired session"));
    }
  };
}
