/**
 * In-process store tests
 *
 * The memory stores back every API test, so they have to keep the same
 * contracts as the PostgreSQL stores.
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { DuplicateKeyError, LINKS_CODE_CONSTRAINT, MemoryLinkStore, MemoryUserStore, type NewLink } from "../src/index.js";

const OWNER = "owner-1";
const OTHER = "owner-2";

function at(minute: number): Date {
  return new Date(Date.UTC(2026, 0, 1, 0, minute));
}

function newLink(code: string, overrides: Partial<NewLink> = {}): NewLink {
  return {
    code,
    destination: `https://example.com/${code}`,
    title: null,
    ownerId: OWNER,
    createdAt: at(0),
    ...overrides,
  };
}

describe("MemoryLinkStore", () => {
  let store: MemoryLinkStore;

  beforeEach(() => {
    store = new MemoryLinkStore();
  });

  describe("insert", () => {
    it("stores a new link with zero clicks and enabled", async () => {
      const link = await store.insert(newLink("abc123", { title: "Docs" }));

      expect(link).toEqual({
        code: "abc123",
        destination: "https://example.com/abc123",
        title: "Docs",
        enabled: true,
        clickCount: 0,
        lastClickedAt: null,
        ownerId: OWNER,
        createdAt: at(0),
        updatedAt: at(0),
      });
      expect(await store.exists("abc123")).toBe(true);
    });

    it("rejects a taken code with the code constraint", async () => {
      await store.insert(newLink("abc123"));

      const error = await store.insert(newLink("abc123", { ownerId: OTHER })).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(DuplicateKeyError);
      expect(error).toMatchObject({ constraint: LINKS_CODE_CONSTRAINT });
      expect(store.size).toBe(1);
    });

    it("lets exactly one of two concurrent inserts of a code win", async () => {
      const results = await Promise.allSettled([store.insert(newLink("race")), store.insert(newLink("race"))]);

      expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
      expect(results.filter((r) => r.status === "rejected")).toHaveLength(1);
    });

    it("treats codes as case-sensitive", async () => {
      await store.insert(newLink("Promo"));
      await store.insert(newLink("promo"));

      expect(store.size).toBe(2);
    });
  });

  describe("findByCode", () => {
    it("returns null for an unknown code", async () => {
      expect(await store.findByCode("nope")).toBeNull();
    });

    it("returns a copy that does not alias stored state", async () => {
      await store.insert(newLink("abc123"));

      const first = await store.findByCode("abc123");
      if (!first) throw new Error("expected a link");
      first.clickCount = 99;

      expect((await store.findByCode("abc123"))?.clickCount).toBe(0);
    });
  });

  describe("incrementClicks", () => {
    it("returns null for an unknown code", async () => {
      expect(await store.incrementClicks("nope", at(1))).toBeNull();
    });

    it("counts every one of 100 concurrent clicks", async () => {
      await store.insert(newLink("hot"));

      await Promise.all(Array.from({ length: 100 }, (_, i) => store.incrementClicks("hot", at(i % 10))));

      const link = await store.findByCode("hot");
      expect(link?.clickCount).toBe(100);
      expect(link?.lastClickedAt).toEqual(at(9));
    });

    it("never moves lastClickedAt backwards", async () => {
      await store.insert(newLink("abc123"));

      await store.incrementClicks("abc123", at(5));
      const tally = await store.incrementClicks("abc123", at(3));

      expect(tally).toEqual({ clickCount: 2, lastClickedAt: at(5) });
    });
  });

  describe("updateOwned", () => {
    it("applies only the given fields and stamps updatedAt", async () => {
      await store.insert(newLink("abc123", { title: "Old" }));

      const updated = await store.updateOwned("abc123", OWNER, { enabled: false }, at(2));

      expect(updated).toMatchObject({
        destination: "https://example.com/abc123",
        title: "Old",
        enabled: false,
        updatedAt: at(2),
        createdAt: at(0),
      });
    });

    it("clears the title with null", async () => {
      await store.insert(newLink("abc123", { title: "Old" }));

      const updated = await store.updateOwned("abc123", OWNER, { title: null }, at(1));

      expect(updated?.title).toBeNull();
    });

    it("returns null and changes nothing for another owner", async () => {
      await store.insert(newLink("abc123"));

      expect(await store.updateOwned("abc123", OTHER, { destination: "https://evil.example" }, at(1))).toBeNull();
      expect((await store.findByCode("abc123"))?.destination).toBe("https://example.com/abc123");
    });
  });

  describe("deleteOwned", () => {
    it("removes the link and frees its code", async () => {
      await store.insert(newLink("abc123"));

      expect(await store.deleteOwned("abc123", OWNER)).toBe(true);
      expect(await store.exists("abc123")).toBe(false);
      await expect(store.insert(newLink("abc123", { ownerId: OTHER }))).resolves.toMatchObject({ ownerId: OTHER });
    });

    it("refuses another owner", async () => {
      await store.insert(newLink("abc123"));

      expect(await store.deleteOwned("abc123", OTHER)).toBe(false);
      expect(await store.exists("abc123")).toBe(true);
    });
  });

  describe("listByOwner", () => {
    beforeEach(async () => {
      await store.insert(newLink("first", { createdAt: at(1), title: "Quarterly report" }));
      await store.insert(newLink("second", { createdAt: at(2) }));
      await store.insert(newLink("third", { createdAt: at(3), destination: "https://docs.example.com/REPORT" }));
      await store.insert(newLink("theirs", { createdAt: at(4), ownerId: OTHER }));
      await store.updateOwned("second", OWNER, { enabled: false }, at(5));
    });

    it("lists only the owner's links, newest first", async () => {
      const result = await store.listByOwner(OWNER, { page: 1, pageSize: 20 }, {});

      expect(result.total).toBe(3);
      expect(result.items.map((l) => l.code)).toEqual(["third", "second", "first"]);
    });

    it("breaks createdAt ties by insertion order", async () => {
      await store.insert(newLink("tie-a", { createdAt: at(9) }));
      await store.insert(newLink("tie-b", { createdAt: at(9) }));

      const result = await store.listByOwner(OWNER, { page: 1, pageSize: 2 }, {});

      expect(result.items.map((l) => l.code)).toEqual(["tie-b", "tie-a"]);
    });

    it("pages through the results", async () => {
      const result = await store.listByOwner(OWNER, { page: 2, pageSize: 2 }, {});

      expect(result.total).toBe(3);
      expect(result.items.map((l) => l.code)).toEqual(["first"]);
    });

    it("filters by enabled", async () => {
      const result = await store.listByOwner(OWNER, { page: 1, pageSize: 20 }, { enabled: false });

      expect(result.items.map((l) => l.code)).toEqual(["second"]);
    });

    it("filters by an inclusive created range", async () => {
      const result = await store.listByOwner(
        OWNER,
        { page: 1, pageSize: 20 },
        { createdFrom: at(2), createdTo: at(3) }
      );

      expect(result.items.map((l) => l.code)).toEqual(["third", "second"]);
    });

    it("searches title and destination case-insensitively", async () => {
      const result = await store.listByOwner(OWNER, { page: 1, pageSize: 20 }, { search: "report" });

      expect(result.items.map((l) => l.code)).toEqual(["third", "first"]);
    });
  });
});

describe("MemoryUserStore", () => {
  let store: MemoryUserStore;

  beforeEach(() => {
    store = new MemoryUserStore();
  });

  it("finds an inserted user by id and email", async () => {
    await store.insert({ id: "u1", email: "ada@example.com", hashedPassword: "h", createdAt: at(0) });

    expect(await store.findById("u1")).toMatchObject({ email: "ada@example.com", active: true });
    expect(await store.findByEmail("ada@example.com")).toMatchObject({ id: "u1" });
    expect(await store.findByEmail("bob@example.com")).toBeNull();
  });

  it("rejects a second account with the same email", async () => {
    await store.insert({ id: "u1", email: "ada@example.com", hashedPassword: "h", createdAt: at(0) });

    await expect(
      store.insert({ id: "u2", email: "ada@example.com", hashedPassword: "h", createdAt: at(0) })
    ).rejects.toBeInstanceOf(DuplicateKeyError);
  });

  it("deactivates a user", async () => {
    await store.insert({ id: "u1", email: "ada@example.com", hashedPassword: "h", createdAt: at(0) });

    store.setActive("u1", false);

    expect((await store.findById("u1"))?.active).toBe(false);
  });
});
