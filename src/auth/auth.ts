import jwt from "jsonwebtoken";
import bcrypt from "bcryptjs";

export interface UserContext {
  username: string;
}

export interface Claims {
  sub: string;
  iat: number;
  exp: number;
}

export const SESSION_COOKIE = "cratr_session";

export function generateSessionToken(username: string, secret: string, ttlSeconds: number): string {
  return jwt.sign({}, secret, {
    subject: username,
    expiresIn: ttlSeconds,
  });
}

export function parseSessionToken(token: string, secret: string): Claims {
  const decoded = jwt.verify(token, secret);
  if (
    typeof decoded === "string" ||
    typeof decoded.sub !== "string" ||
    typeof decoded.iat !== "number" ||
    typeof decoded.exp !== "number"
  ) {
    throw new Error("Malformed session token");
  }
  return { sub: decoded.sub, iat: decoded.iat, exp: decoded.exp };
}

export async function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, 10);
}

export async function checkPassword(password: string, hash: string): Promise<boolean> {
  return bcrypt.compare(password, hash);
}

/** The single configured account. The password is only kept as a bcrypt hash. */
export class Credentials {
  private constructor(
    readonly username: string,
    private passwordHash: string,
  ) {}

  static async create(username: string, password: string): Promise<Credentials> {
    return new Credentials(username, await hashPassword(password));
  }

  async verify(username: string, password: string): Promise<boolean> {
    // compare even on a wrong username so both failures take the same time
    const valid = await checkPassword(password, this.passwordHash);
    return valid && username === this.username;
  }
}
