/**
 * Authentication Service
 *
 * Handles user registration, login, and JWT token management.
 * Uses bcrypt for password hashing and jsonwebtoken for JWT.
 */

import { randomUUID } from "node:crypto";
import bcrypt from "bcrypt";
import jwt from "jsonwebtoken";
import { z } from "zod";
import { DuplicateKeyError, toSafeUser, type SafeUser, type User, type UserStore } from "@shortlane/db";
import { createLogger, type Logger } from "@shortlane/logger";
import { fail, ok, type ServiceFailure, type ServiceResult } from "./results.js";

// ============================================================================
// Types
// ============================================================================

export interface AuthPayload {
  userId: string;
  email: string;
}

export interface AuthSession {
  token: string;
  user: SafeUser;
}

export interface Credentials {
  email: string;
  password: string;
}

export interface AuthServiceOptions {
  jwtSecret: string;
  /** Token lifetime in seconds */
  jwtExpiresInSeconds: number;
  bcryptRounds: number;
  clock?: () => Date;
  logger?: Logger;
}

const authPayloadSchema = z.object({
  userId: z.string().min(1),
  email: z.string(),
});

/**
 * Normalize an email for storage and lookup
 */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

// ============================================================================
// Auth Service
// ============================================================================

export class AuthService {
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly users: UserStore,
    private readonly options: AuthServiceOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger("auth");
  }

  /**
   * Register a new user and sign them in
   */
  async register(input: Credentials): Promise<ServiceResult<AuthSession>> {
    const email = normalizeEmail(input.email);

    if (await this.users.findByEmail(email)) {
      return emailTaken();
    }

    const hashedPassword = await bcrypt.hash(input.password, this.options.bcryptRounds);

    let user: User;
    try {
      user = await this.users.insert({ id: randomUUID(), email, hashedPassword, createdAt: this.clock() });
    } catch (err) {
      if (err instanceof DuplicateKeyError) {
        return emailTaken();
      }
      throw err;
    }

    this.logger.info({ userId: user.id }, "User registered");
    return ok(this.session(user));
  }

  /**
   * Login with email and password
   */
  async login(input: Credentials): Promise<ServiceResult<AuthSession>> {
    const user = await this.users.findByEmail(normalizeEmail(input.email));

    // Same answer for unknown email and wrong password
    if (!user || !(await bcrypt.compare(input.password, user.hashedPassword))) {
      this.logger.debug("Invalid login attempt");
      return fail("INVALID_CREDENTIALS", "Invalid email or password");
    }

    if (!user.active) {
      return fail("INACTIVE_USER", "Account is disabled");
    }

    this.logger.info({ userId: user.id }, "User logged in");
    return ok(this.session(user));
  }

  /**
   * Verify and decode a JWT token
   */
  verifyToken(token: string): AuthPayload | null {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, this.options.jwtSecret);
    } catch (error) {
      this.logger.debug({ error }, "Token verification failed");
      return null;
    }

    const payload = authPayloadSchema.safeParse(decoded);
    return payload.success ? payload.data : null;
  }

  /**
   * The user behind a token, or null if gone or deactivated
   */
  async getActiveUser(userId: string): Promise<SafeUser | null> {
    const user = await this.users.findById(userId);
    return user && user.active ? toSafeUser(user) : null;
  }

  private session(user: User): AuthSession {
    const payload: AuthPayload = { userId: user.id, email: user.email };
    const token = jwt.sign(payload, this.options.jwtSecret, {
      expiresIn: this.options.jwtExpiresInSeconds,
    });
    return { token, user: toSafeUser(user) };
  }
}

function emailTaken(): ServiceFailure {
  return fail("EMAIL_TAKEN", "Email already registered");
}
