/**
 * UrlRegistry Tests
 *
 * Creation, ownership-checked updates and deletes, and listing.
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { MemoryLinkStore } from "@shortlane/db";
import { RandomCodeGenerator, SHORTCODE_CONFIG, type CodeGenerator } from "@shortlane/shared";
import { UniquenessArbiter, UrlRegistry } from "../src/services/index.js";
import { ScriptedGenerator, TestClock, T0 } from "./helpers.js";

const OWNER = "owner-1";
const STRANGER = "owner-2";

describe("UrlRegistry", () => {
  let store: MemoryLinkStore;
  let clock: TestClock;

  function registry(generator: CodeGenerator = new ScriptedGenerator(["abc123", "def456", "ghi789"])): UrlRegistry {
    return new UrlRegistry(store, new UniquenessArbiter(store, { generator }), { clock: clock.now });
  }

  beforeEach(() => {
    store = new MemoryLinkStore();
    clock = new TestClock();
  });

  describe("create", () => {
    it("creates an enabled link with no clicks under a generated code", async () => {
      const result = await registry().create({ ownerId: OWNER, destination: "https://example.com/a" });

      expect(result).toEqual({
        success: true,
        data: {
          code: "abc123",
          destination: "https://example.com/a",
          title: null,
          enabled: true,
          clickCount: 0,
          lastClickedAt: null,
          ownerId: OWNER,
          createdAt: T0,
          updatedAt: T0,
        },
      });
    });

    it("keeps a free custom code exactly", async () => {
      const result = await registry().create({
        ownerId: OWNER,
        destination: "https://example.com/launch",
        code: "Launch-2026",
        title: "Launch page",
      });

      expect(result).toMatchObject({ success: true, data: { code: "Launch-2026", title: "Launch page" } });
    });

    it("fails a live custom code without inserting anything", async () => {
      const links = registry();
      await links.create({ ownerId: OWNER, destination: "https://example.com/a", code: "promo" });

      const result = await links.create({ ownerId: STRANGER, destination: "https://example.com/b", code: "promo" });

      expect(result).toMatchObject({ success: false, errorCode: "CODE_TAKEN" });
      expect(store.size).toBe(1);
      expect((await store.findByCode("promo"))?.ownerId).toBe(OWNER);
    });

    it.each([
      ["", "Destination URL is required"],
      ["not a url", "Destination is not a valid URL"],
      ["ftp://files.example.com/a", "Destination must use http or https"],
      ["http://localhost:3000/admin", "Destination host is not allowed"],
      [`https://example.com/${"x".repeat(2048)}`, "Destination URL too long (max 2048 characters)"],
    ])("rejects destination %j", async (destination, error) => {
      const result = await registry().create({ ownerId: OWNER, destination });

      expect(result).toEqual({ success: false, errorCode: "INVALID_DESTINATION", error });
      expect(store.size).toBe(0);
    });

    it("stores the percent-encoded form of the destination", async () => {
      const result = await registry().create({ ownerId: OWNER, destination: "https://Example.com/caf✨?q=a b" });

      expect(result).toMatchObject({
        success: true,
        data: { destination: "https://example.com/caf%E2%9C%A8?q=a%20b" },
      });
    });

    it("gives every generated link a distinct, well-formed code", async () => {
      const links = registry(new RandomCodeGenerator());
      const codes = new Set<string>();

      for (let i = 0; i < 50; i++) {
        const result = await links.create({ ownerId: OWNER, destination: `https://example.com/${i}` });
        if (!result.success) throw new Error(result.error);
        codes.add(result.data.code);
      }

      expect(codes.size).toBe(50);
      for (const code of codes) {
        expect(code).toHaveLength(SHORTCODE_CONFIG.DEFAULT_LENGTH);
        expect(code).toMatch(/^[a-km-zA-HJ-NP-Z1-9]+$/);
      }
    });
  });

  describe("get", () => {
    it("fails NOT_FOUND for an unknown code", async () => {
      expect(await registry().get("nope")).toEqual({
        success: false,
        errorCode: "NOT_FOUND",
        error: 'Short link "nope" not found',
      });
    });
  });

  describe("update", () => {
    let links: UrlRegistry;

    beforeEach(async () => {
      links = registry();
      await links.create({ ownerId: OWNER, destination: "https://example.com/a", title: "Old" });
      clock.advance(60_000);
    });

    it("applies the owner's patch and bumps updatedAt", async () => {
      const result = await links.update("abc123", OWNER, { destination: "https://example.com/b", enabled: false });

      expect(result).toMatchObject({
        success: true,
        data: {
          code: "abc123",
          destination: "https://example.com/b",
          title: "Old",
          enabled: false,
          createdAt: T0,
          updatedAt: new Date(T0.getTime() + 60_000),
        },
      });
    });

    it("forbids another owner and leaves the link unchanged", async () => {
      const result = await links.update("abc123", STRANGER, { destination: "https://evil.example.com" });

      expect(result).toEqual({
        success: false,
        errorCode: "FORBIDDEN",
        error: 'You do not own short link "abc123"',
      });
      expect(await store.findByCode("abc123")).toMatchObject({
        destination: "https://example.com/a",
        updatedAt: T0,
      });
    });

    it("fails NOT_FOUND for an unknown code", async () => {
      expect(await links.update("nope", OWNER, { enabled: false })).toMatchObject({ errorCode: "NOT_FOUND" });
    });

    it("forbids a non-owner even when the destination is invalid", async () => {
      expect(await links.update("abc123", STRANGER, { destination: "nope" })).toEqual({
        success: false,
        errorCode: "FORBIDDEN",
        error: 'You do not own short link "abc123"',
      });
      expect(await links.update("missing", STRANGER, { destination: "nope" })).toMatchObject({
        errorCode: "NOT_FOUND",
      });
    });

    it("normalizes a new destination", async () => {
      const result = await links.update("abc123", OWNER, { destination: "https://example.com/über" });

      expect(result).toMatchObject({ success: true, data: { destination: "https://example.com/%C3%BCber" } });
    });

    it("validates a new destination", async () => {
      const result = await links.update("abc123", OWNER, { destination: "javascript:alert(1)" });

      expect(result).toMatchObject({ errorCode: "INVALID_DESTINATION" });
      expect((await store.findByCode("abc123"))?.destination).toBe("https://example.com/a");
    });
  });

  describe("delete", () => {
    let links: UrlRegistry;

    beforeEach(async () => {
      links = registry();
      await links.create({ ownerId: OWNER, destination: "https://example.com/a", code: "promo" });
    });

    it("removes the link and frees the code at once", async () => {
      expect(await links.delete("promo", OWNER)).toEqual({ success: true, data: undefined });
      expect(await links.get("promo")).toMatchObject({ errorCode: "NOT_FOUND" });

      const reused = await links.create({ ownerId: STRANGER, destination: "https://example.com/b", code: "promo" });
      expect(reused).toMatchObject({ success: true, data: { code: "promo", ownerId: STRANGER } });
    });

    it("forbids another owner and keeps the link", async () => {
      expect(await links.delete("promo", STRANGER)).toMatchObject({ errorCode: "FORBIDDEN" });
      expect(await store.exists("promo")).toBe(true);
    });

    it("fails NOT_FOUND for an unknown code", async () => {
      expect(await links.delete("nope", OWNER)).toMatchObject({ errorCode: "NOT_FOUND" });
    });
  });

  describe("listForOwner", () => {
    let links: UrlRegistry;

    beforeEach(async () => {
      links = registry(new ScriptedGenerator(["code01", "code02", "code03", "code04", "code05", "code06"]));
      for (let i = 0; i < 5; i++) {
        await links.create({ ownerId: OWNER, destination: `https://example.com/${i}` });
        clock.advance(1000);
      }
      await links.create({ ownerId: STRANGER, destination: "https://example.com/theirs" });
    });

    it("pages the owner's links newest first with totals", async () => {
      const page = await links.listForOwner(OWNER, { page: 2, pageSize: 2 });

      expect(page.items.map((link) => link.code)).toEqual(["code03", "code02"]);
      expect(page).toMatchObject({ total: 5, page: 2, pageSize: 2, totalPages: 3 });
    });

    it("defaults to the first page of 20", async () => {
      const page = await links.listForOwner(OWNER);

      expect(page).toMatchObject({ total: 5, page: 1, pageSize: 20, totalPages: 1 });
      expect(page.items).toHaveLength(5);
    });

    it("clamps out-of-range pagination", async () => {
      const page = await links.listForOwner(OWNER, { page: 0, pageSize: 500 });

      expect(page).toMatchObject({ page: 1, pageSize: 100 });
    });

    it("applies filters", async () => {
      await links.update("code05", OWNER, { enabled: false });

      const disabled = await links.listForOwner(OWNER, {}, { enabled: false });
      const range = await links.listForOwner(
        OWNER,
        {},
        { createdFrom: new Date(T0.getTime() + 1000), createdTo: new Date(T0.getTime() + 2000) }
      );

      expect(disabled.items.map((link) => link.code)).toEqual(["code05"]);
      expect(range.items.map((link) => link.code)).toEqual(["code03", "code02"]);
    });

    it("reports zero pages for an owner with no links", async () => {
      expect(await links.listForOwner("nobody")).toMatchObject({ items: [], total: 0, totalPages: 0 });
    });
  });
});
