import type { Express, Request, Response } from "express";
import type { AuthConfig } from "../config/index.js";
import { asyncHandler } from "../middleware/async-handler.js";
import { readSessionToken } from "./middleware.js";
import {
  generateSessionToken,
  parseSessionToken,
  SESSION_COOKIE,
  type Credentials,
} from "./auth.js";

interface LoginBody {
  username: string;
  password: string;
}

function isLoginBody(body: unknown): body is LoginBody {
  return (
    typeof body === "object" &&
    body !== null &&
    "username" in body &&
    "password" in body &&
    typeof body.username === "string" &&
    typeof body.password === "string"
  );
}

export class AuthHandler {
  private credentials: Credentials;
  private cfg: AuthConfig;

  constructor(credentials: Credentials, cfg: AuthConfig) {
    this.credentials = credentials;
    this.cfg = cfg;
  }

  login = asyncHandler(async (req: Request, res: Response) => {
    const body: unknown = req.body;
    const valid = isLoginBody(body) && (await this.credentials.verify(body.username, body.password));
    if (!valid) {
      res.status(401).json({
        success: false,
        message: "Invalid credentials",
        authenticated: false,
      });
      return;
    }

    const token = generateSessionToken(this.credentials.username, this.cfg.jwt_secret, this.cfg.session_ttl);
    res.cookie(SESSION_COOKIE, token, {
      httpOnly: true,
      sameSite: "lax",
      path: "/",
      maxAge: this.cfg.session_ttl * 1000,
    });
    res.json({
      success: true,
      message: "Login successful",
      authenticated: true,
    });
  });

  logout = (_req: Request, res: Response) => {
    res.clearCookie(SESSION_COOKIE, { path: "/" });
    res.json({
      success: true,
      message: "Logged out successfully",
      authenticated: false,
    });
  };

  status = (req: Request, res: Response) => {
    const token = readSessionToken(req);
    let username: string | null = null;
    if (token) {
      try {
        username = parseSessionToken(token, this.cfg.jwt_secret).sub;
      } catch {
        username = null;
      }
    }
    res.json({ authenticated: username !== null, username });
  };
}

export function registerAuthRoutes(app: Express, handler: AuthHandler): void {
  app.post("/login", handler.login);
  app.post("/logout", handler.logout);
  app.get("/auth/status", handler.status);
}
