import { describe, it, expect } from "vitest";
import { createPool, initSchema, verifyConnection, withTransaction } from "../src/db.js";
import { ConnectionError } from "../src/errors.js";
import { createMockPool, executedSql } from "./helpers/mock-pool.js";

describe("createPool", () => {
  it("rejects a DSN that is not a postgres URL", () => {
    expect(() => createPool("mysql://manga@localhost/manga")).toThrow(ConnectionError);
  });
});

describe("verifyConnection", () => {
  it("wraps driver failures in ConnectionError", async () => {
    const { pool } = createMockPool(() => {
      throw new Error("connect ECONNREFUSED 127.0.0.1:5432");
    });

    const failure = verifyConnection(pool as never);

    await expect(failure).rejects.toThrow(ConnectionError);
    await expect(failure).rejects.toThrow("database unreachable: connect ECONNREFUSED 127.0.0.1:5432");
  });

  it("resolves when the round trip succeeds", async () => {
    const { pool } = createMockPool();
    await expect(verifyConnection(pool as never)).resolves.toBeUndefined();
    expect(pool.query).toHaveBeenCalledWith("SELECT 1");
  });
});

describe("withTransaction", () => {
  it("commits and returns the callback result", async () => {
    const { pool, client } = createMockPool();

    const result = await withTransaction(pool as never, async (tx) => {
      await tx.query("SELECT 42");
      return "ok";
    });

    expect(result).toBe("ok");
    expect(executedSql(client)).toEqual(["BEGIN", "SELECT 42", "COMMIT"]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it("rolls back and rethrows when the callback fails", async () => {
    const { pool, client } = createMockPool();

    await expect(
      withTransaction(pool as never, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(executedSql(client)).toEqual(["BEGIN", "ROLLBACK"]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });
});

describe("initSchema", () => {
  it("runs every statement in one transaction", async () => {
    const { pool, client } = createMockPool();

    await initSchema(pool as never, ["CREATE TABLE a (id INT)", "CREATE TABLE b (id INT)"]);

    expect(executedSql(client)).toEqual(["BEGIN", "CREATE TABLE a (id INT)", "CREATE TABLE b (id INT)", "COMMIT"]);
  });
});
