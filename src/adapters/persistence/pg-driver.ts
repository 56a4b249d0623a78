import pg, {
  type ClientConfig,
  type CustomTypesConfig,
  type QueryArrayConfig,
  type QueryArrayResult,
} from "pg";
import type {
  ConnectionCredentials,
  DatabaseDriverPort,
  DriverConnection,
  DriverResult,
  DriverStatement,
} from "../../core/ports/database-driver.port.js";
import {
  BindCountMismatchError,
  ConnectionError,
  DatabaseSelectionError,
  DomainError,
  DriverQueryError,
  PlaceholderCountError,
} from "../../core/domain/errors/index.js";
import {
  isBindTypeTag,
  type BindTypeTag,
  type BindValue,
} from "../../core/domain/value-objects/bind-value.js";
import { toPositionalPlaceholders } from "./pg-placeholders.js";

/**
 * PostgreSQL Driver (Default)
 *
 * Implements DatabaseDriverPort on a single pg.Client session.
 */

/**
 * Array-mode query config. `queryMode: "extended"` forces Parse/Bind/Execute
 * even without values, so the server refuses multi-statement strings.
 */
export type PgQuery = QueryArrayConfig & { queryMode?: "extended" };

/** The slice of pg.Client this adapter talks to */
export interface PgSession {
  connect(): Promise<void>;
  query(config: PgQuery): Promise<QueryArrayResult>;
  end(): Promise<void>;
}

export type PgSessionFactory = (config: ClientConfig) => PgSession;

const SQLSTATE_PATTERN = /^(?:[0-9][0-9A-Z]|HV|P0|XX)[0-9A-Z]{3}$/;
const INVALID_CATALOG_NAME = "3D000";
/** Syntax Error or Access Rule Violation */
const SYNTAX_ERROR_CLASS = "42";

const INT8_OID = 20;
const NUMERIC_OID = 1700;

/**
 * Per-session parsers: int8 and exactly representable numeric values come
 * back as JavaScript numbers. The process-wide pg.types stay untouched.
 */
export function createNativeNumericTypes(): CustomTypesConfig {
  const types = new pg.TypeOverrides();
  types.setTypeParser(INT8_OID, parseInt8);
  types.setTypeParser(NUMERIC_OID, parseNumeric);
  return types;
}

export const NATIVE_NUMERIC_TYPES = createNativeNumericTypes();

export function parseInt8(value: string): number | bigint {
  const n = Number(value);
  return Number.isSafeInteger(n) ? n : BigInt(value);
}

/**
 * A numeric becomes a number only when the number prints back as the same
 * decimal (trailing fractional zeros aside); otherwise the text is kept.
 */
export function parseNumeric(value: string): number | string {
  const canonical = value.includes(".") ? value.replace(/\.?0+$/, "") : value;
  const n = Number(value);
  return String(n) === canonical ? n : value;
}

export function openPgSession(config: ClientConfig): PgSession {
  const client = new pg.Client(config);
  // An idle session that loses its server emits "error"; unhandled, it would crash the process
  client.on("error", (error) => {
    console.error("[PgDatabaseDriver] Session error:", error.message);
  });
  return {
    connect: () => client.connect(),
    query: (query) => client.query(query),
    end: () => client.end(),
  };
}

export class PgDatabaseDriver implements DatabaseDriverPort {
  constructor(private readonly openSession: PgSessionFactory = openPgSession) {}

  async connect(credentials: ConnectionCredentials): Promise<DriverConnection> {
    const session = this.openSession({
      host: credentials.host,
      port: credentials.port,
      user: credentials.username,
      password: credentials.password,
      database: credentials.database,
      types: NATIVE_NUMERIC_TYPES,
    });

    try {
      await session.connect();
    } catch (error) {
      if (sqlState(error) === INVALID_CATALOG_NAME) {
        throw new DatabaseSelectionError(credentials.database);
      }
      throw new ConnectionError(errorCode(error), errorMessage(error));
    }

    return new PgConnection(session);
  }
}

export class PgConnection implements DriverConnection {
  constructor(private readonly session: PgSession) {}

  /**
   * Statements stay unnamed: the server re-parses them on every execute and
   * keeps nothing between calls. Parse and Execute share one round trip, so a
   * template the server rejects is reported when the statement executes.
   */
  async prepare(sql: string): Promise<PgStatement> {
    const { text, placeholderCount } = toPositionalPlaceholders(sql);
    return new PgStatement(this.session, text, placeholderCount);
  }

  async query(sql: string): Promise<DriverResult> {
    try {
      const result = await this.session.query({
        text: sql,
        rowMode: "array",
        queryMode: "extended",
      });
      return toDriverResult(result);
    } catch (error) {
      throw toDriverQueryError(error);
    }
  }

  async close(): Promise<void> {
    await this.session.end();
  }
}

export class PgStatement implements DriverStatement {
  private values: unknown[] = [];

  constructor(
    private readonly session: PgSession,
    readonly text: string,
    readonly placeholderCount: number,
  ) {}

  bind(types: string, values: readonly BindValue[]): void {
    if (types.length !== values.length) {
      throw new BindCountMismatchError(types.length, values.length);
    }
    if (values.length !== this.placeholderCount) {
      throw new PlaceholderCountError(this.placeholderCount, values.length);
    }
    this.values = values.map((value, i) => {
      const tag = types.charAt(i);
      if (!isBindTypeTag(tag)) {
        throw new DomainError(`Unknown bind type tag "${tag}" at position ${i}`);
      }
      return serializeBindValue(tag, value);
    });
  }

  async execute(): Promise<DriverResult> {
    try {
      const result = await this.session.query({
        text: this.text,
        values: this.values,
        rowMode: "array",
      });
      return toDriverResult(result);
    } catch (error) {
      throw toDriverQueryError(error);
    }
  }
}

/**
 * Booleans travel as 1/0 under the integer tag; bigints as their decimal
 * text so no precision is lost.
 */
export function serializeBindValue(
  tag: BindTypeTag,
  value: BindValue,
): number | string {
  switch (tag) {
    case "i":
    case "d":
      if (typeof value === "boolean") return value ? 1 : 0;
      if (typeof value === "bigint") return value.toString();
      return value;
    case "s":
      return String(value);
  }
}

function toDriverResult(result: QueryArrayResult): DriverResult {
  return {
    columns: result.fields.map((field) => field.name),
    rows: result.rows,
    affectedRows: result.rowCount ?? -1,
  };
}

function toDriverQueryError(error: unknown): DriverQueryError {
  const code = sqlState(error);
  const phase = code?.startsWith(SYNTAX_ERROR_CLASS) ? "prepare" : "execute";
  return new DriverQueryError(phase, errorMessage(error), code);
}

function sqlState(error: unknown): string | undefined {
  const code = errorCode(error);
  return SQLSTATE_PATTERN.test(code) ? code : undefined;
}

function errorCode(error: unknown): string {
  if (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }
  return "UNKNOWN";
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
