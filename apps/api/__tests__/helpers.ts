/**
 * Test helpers: configuration, scripted code generators and an app built
 * over in-memory stores.
 */

import type { FastifyInstance } from "fastify";
import { MemoryLinkStore, MemoryUserStore } from "@shortlane/db";
import type { CodeGenerator } from "@shortlane/shared";
import { buildApp } from "../src/app.js";
import { loadConfig, type AppConfig } from "../src/config.js";

export const T0 = new Date("2026-03-01T12:00:00.000Z");

export function testConfig(overrides: Record<string, string> = {}): AppConfig {
  return loadConfig({
    NODE_ENV: "test",
    STORE_DRIVER: "memory",
    JWT_SECRET: "test-secret",
    BCRYPT_ROUNDS: "4",
    SHORT_URL_BASE: "https://sho.rt/",
    RATE_LIMIT_MAX: "10000",
    RATE_LIMIT_CREATE_MAX: "10000",
    RATE_LIMIT_AUTH_MAX: "10000",
    ...overrides,
  });
}

/**
 * Hands out the given codes in order, then fails the test loudly
 */
export class ScriptedGenerator implements CodeGenerator {
  calls = 0;
  private readonly codes: string[];

  constructor(codes: string[]) {
    this.codes = [...codes];
  }

  generate(): string {
    this.calls++;
    const next = this.codes.shift();
    if (next === undefined) {
      throw new Error("ScriptedGenerator ran out of codes");
    }
    return next;
  }
}

/**
 * Always returns the same code
 */
export class FixedGenerator implements CodeGenerator {
  calls = 0;

  constructor(private readonly code: string) {}

  generate(): string {
    this.calls++;
    return this.code;
  }
}

/**
 * A clock tests can move forward
 */
export class TestClock {
  private current: Date;

  constructor(start: Date = T0) {
    this.current = start;
  }

  now = (): Date => this.current;

  advance(ms: number): Date {
    this.current = new Date(this.current.getTime() + ms);
    return this.current;
  }
}

export interface TestApp {
  app: FastifyInstance;
  linkStore: MemoryLinkStore;
  userStore: MemoryUserStore;
  clock: TestClock;
}

export async function createTestApp(
  options: { generator?: CodeGenerator; config?: Record<string, string> } = {}
): Promise<TestApp> {
  const linkStore = new MemoryLinkStore();
  const userStore = new MemoryUserStore();
  const clock = new TestClock();

  const app = await buildApp({
    config: testConfig(options.config),
    linkStore,
    userStore,
    generator: options.generator,
    clock: clock.now,
  });
  await app.ready();

  return { app, linkStore, userStore, clock };
}

export interface TestUser {
  id: string;
  token: string;
  headers: { authorization: string };
}

/**
 * Register a user over HTTP and return its bearer token
 */
export async function signUp(app: FastifyInstance, email: string): Promise<TestUser> {
  const response = await app.inject({
    method: "POST",
    url: "/auth/register",
    payload: { email, password: "correct-horse" },
  });
  if (response.statusCode !== 201) {
    throw new Error(`signUp failed with ${response.statusCode}: ${response.body}`);
  }

  const { data } = response.json<{ data: { token: string; user: { id: string } } }>();
  return { id: data.user.id, token: data.token, headers: { authorization: `Bearer ${data.token}` } };
}
