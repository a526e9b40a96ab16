import { describe, it, expect, vi } from "vitest";
import { PGlite } from "@electric-sql/pglite";
import { openCorpusStore } from "../src/db/store";
import { CorpusDatabaseError, ErrorCode } from "../src/errors";

vi.mock("../src/db/migrate", () => ({
  migrate: vi.fn(async () => {
    throw new Error("relation already exists");
  }),
}));

describe("openCorpusStore", () => {
  it("should close the client and report a connection failure when migration fails", async () => {
    const close = vi.spyOn(PGlite.prototype, "close");

    const err = await openCorpusStore().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CorpusDatabaseError);
    if (err instanceof CorpusDatabaseError) expect(err.code).toBe(ErrorCode.DB_CONNECTION_FAILED);
    expect(close).toHaveBeenCalledTimes(1);
    close.mockRestore();
  });

  it("should open without migrating when asked to skip it", async () => {
    const store = await openCorpusStore({ skipMigrate: true });

    expect(store.dataDir).toBeUndefined();
    await store.close();
  });
});
