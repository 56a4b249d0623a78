import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Database } from "../../src/main/database.js";
import {
  BindCountMismatchError,
  ConnectionError,
  DriverQueryError,
} from "../../src/core/domain/errors/index.js";
import { InMemoryMetrics } from "../../src/adapters/telemetry/metrics.js";
import {
  createFakeConnection,
  createFakeStatement,
  driverResult,
  type FakeConnection,
  type FakeStatement,
} from "../helpers/fake-driver.js";

const credentials = {
  host: "db.local",
  username: "app",
  password: "test-secret",
  database: "shop",
};

describe("Database", () => {
  let statement: FakeStatement;
  let connection: FakeConnection;
  let driver: { connect: ReturnType<typeof vi.fn> };

  beforeEach(() => {
    statement = createFakeStatement();
    connection = createFakeConnection(statement);
    driver = { connect: vi.fn().mockResolvedValue(connection) };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("connect", () => {
    it("should connect through the driver and log the target", async () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});

      await Database.connect(credentials, { driver });

      expect(driver.connect).toHaveBeenCalledWith(credentials);
      expect(log).toHaveBeenCalledWith("[Database] Connected to shop@db.local");
    });

    it("should rethrow construction errors", async () => {
      const error = vi.spyOn(console, "error").mockImplementation(() => {});
      driver.connect.mockRejectedValueOnce(new ConnectionError("ECONNREFUSED", "refused"));

      await expect(Database.connect(credentials, { driver })).rejects.toBeInstanceOf(
        ConnectionError,
      );
      expect(error).toHaveBeenCalledWith(
        "[Database] Could not connect to shop@db.local: ECONNREFUSED: refused",
      );
    });

    it("should stay quiet with logging off", async () => {
      const log = vi.spyOn(console, "log").mockImplementation(() => {});

      await Database.connect(credentials, { driver, logging: false });

      expect(log).not.toHaveBeenCalled();
    });
  });

  describe("runQuery", () => {
    let database: Database;

    beforeEach(async () => {
      database = await Database.connect(credentials, { driver, logging: false });
    });

    it("should start out empty", () => {
      expect(database.error).toBe("");
      expect(database.affectedRows).toBe(0);
      expect(database.result).toEqual([]);
      expect(database.hasError()).toBe(false);
    });

    it("should mirror a successful outcome", async () => {
      statement.execute.mockResolvedValueOnce(
        driverResult({ columns: ["id", "name"], rows: [[42, "Ada"]], affectedRows: 1 }),
      );

      const outcome = await database.runQuery("SELECT * FROM users WHERE id=", [42], {
        autoBrackets: true,
      });

      expect(outcome.ok).toBe(true);
      expect(database.hasError()).toBe(false);
      expect(database.error).toBe("");
      expect(database.affectedRows).toBe(1);
      expect(database.result).toEqual([{ id: 42, name: "Ada" }]);
      expect(database.lastOutcome).toBe(outcome);
    });

    it("should replace the previous result on failure", async () => {
      connection.query.mockResolvedValueOnce(
        driverResult({ columns: ["id"], rows: [[1]], affectedRows: 1 }),
      );
      await database.runQuery("SELECT id FROM t");
      connection.prepare.mockRejectedValueOnce(
        new DriverQueryError("prepare", 'syntax error at or near "FORM"', "42601"),
      );

      await database.runQuery("SELECT * FORM t WHERE id = ?", [1], {
        errorMessage: "lookup failed: ",
      });

      expect(database.hasError()).toBe(true);
      expect(database.error).toBe(
        'lookup failed: Invalid SQL syntax: syntax error at or near "FORM"',
      );
      expect(database.result).toEqual([]);
      expect(database.affectedRows).toBe(0);
    });

    it("should clear the error after a later success", async () => {
      connection.query.mockRejectedValueOnce(new Error("boom"));
      await database.runQuery("SELEC 1");
      expect(database.error).toBe("Error running query: boom");

      await database.runQuery("DELETE FROM temp", [], { withResult: false });

      expect(database.hasError()).toBe(false);
      expect(database.error).toBe("");
    });

    it("should reset the fields before an internal fault propagates", async () => {
      connection.query.mockResolvedValueOnce(
        driverResult({ columns: ["id"], rows: [[1]], affectedRows: 1 }),
      );
      await database.runQuery("SELECT id FROM t");
      statement.bind.mockImplementationOnce(() => {
        throw new BindCountMismatchError(1, 2);
      });

      await expect(database.runQuery("SELECT ?", [1])).rejects.toBeInstanceOf(
        BindCountMismatchError,
      );
      expect(database.result).toEqual([]);
      expect(database.affectedRows).toBe(0);
      expect(database.error).toBe("");
    });

    it("should close the connection", async () => {
      await database.close();

      expect(connection.close).toHaveBeenCalled();
    });
  });

  it("should pass an injected metrics recorder through", async () => {
    const metrics = new InMemoryMetrics();
    const database = await Database.connect(credentials, {
      driver,
      metrics,
      logging: false,
    });

    await database.runQuery("SELECT 1");

    expect(metrics.recorded).toHaveLength(1);
    expect(metrics.recorded[0]).toMatchObject({ status: "ok", prepared: false });
  });
});
