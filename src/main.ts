/**
 * Application Entry Point
 *
 * Runs one query against the configured database and prints the outcome.
 *
 *   pg-safe-query "SELECT * FROM users WHERE id=" '[42]' --auto-brackets
 *
 * Flags: --auto-brackets, --no-result, --no-sql-error, --error-message=<text>
 */

import { fileURLToPath } from "url";
import { isBindValue, type BindValue } from "./core/domain/value-objects/bind-value.js";
import type { RunQueryOptions } from "./core/domain/value-objects/query-options.js";
import type { QueryOutcome } from "./core/domain/value-objects/query-outcome.js";
import { loadDatabaseConfig } from "./main/config.js";
import { Database } from "./main/database.js";

export interface CliRequest {
  sql: string;
  variables: BindValue[];
  options: Partial<RunQueryOptions>;
}

export function parseArgs(argv: readonly string[]): CliRequest {
  const positional: string[] = [];
  const options: Partial<RunQueryOptions> = {};

  for (const arg of argv) {
    if (arg === "--auto-brackets") options.autoBrackets = true;
    else if (arg === "--no-result") options.withResult = false;
    else if (arg === "--no-sql-error") options.withSqlError = false;
    else if (arg.startsWith("--error-message=")) {
      options.errorMessage = arg.slice("--error-message=".length);
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown flag: ${arg}`);
    } else positional.push(arg);
  }

  const [sql, variablesJson] = positional;
  if (!sql) {
    throw new Error("Usage: pg-safe-query <sql> [variables-json] [flags]");
  }
  return {
    sql,
    variables: variablesJson ? parseVariables(variablesJson) : [],
    options,
  };
}

export function parseVariables(json: string): BindValue[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) {
    throw new Error("Variables must be a JSON array");
  }
  return parsed.map((value: unknown, i) => {
    if (!isBindValue(value)) {
      throw new Error(`Variable ${i} must be a boolean, number or string`);
    }
    return value;
  });
}

/**
 * Printable form of an outcome; bigints become strings
 */
export function formatOutcome(outcome: QueryOutcome): string {
  return JSON.stringify(
    {
      ok: outcome.ok,
      error: outcome.error,
      affectedRows: outcome.affectedRows,
      rows: outcome.rows,
    },
    (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value),
    2,
  );
}

async function bootstrap() {
  const request = parseArgs(process.argv.slice(2));
  const config = loadDatabaseConfig();
  const database = await Database.connect(config, { logging: config.logging });

  try {
    const outcome = await database.runQuery(
      request.sql,
      request.variables,
      request.options,
    );
    console.log(formatOutcome(outcome));
    process.exitCode = outcome.ok ? 0 : 1;
  } finally {
    await database.close();
  }
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  bootstrap().catch((err: unknown) => {
    console.error("❌ Query run failed:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
