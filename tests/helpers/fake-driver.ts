/**
 * In-process stand-ins for the database driver port.
 */

import { vi } from "vitest";
import type { DriverResult } from "../../src/core/ports/database-driver.port.js";

export function driverResult(overrides: Partial<DriverResult> = {}): DriverResult {
  return { columns: [], rows: [], affectedRows: 0, ...overrides };
}

export function createFakeStatement(result: DriverResult = driverResult()) {
  return {
    bind: vi.fn(),
    execute: vi.fn(async () => result),
  };
}

export function createFakeConnection(
  statement = createFakeStatement(),
  rawResult: DriverResult = driverResult(),
) {
  return {
    prepare: vi.fn(async (_sql: string) => statement),
    query: vi.fn(async (_sql: string) => rawResult),
    close: vi.fn(async () => {}),
  };
}

export type FakeStatement = ReturnType<typeof createFakeStatement>;
export type FakeConnection = ReturnType<typeof createFakeConnection>;
