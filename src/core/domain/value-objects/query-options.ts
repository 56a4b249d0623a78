/**
 * Query Options Value Object
 */

export interface RunQueryOptions {
  /** Message stored as the call's error when the query fails */
  errorMessage: string;
  /** Append the driver's diagnostic text to `errorMessage` */
  withSqlError: boolean;
  /** Materialize returned rows into the result set */
  withResult: boolean;
  /** Append a `(?,?,...)` list sized to the variables */
  autoBrackets: boolean;
}

export const DEFAULT_QUERY_OPTIONS: RunQueryOptions = {
  errorMessage: "",
  withSqlError: true,
  withResult: true,
  autoBrackets: false,
};

export const DEFAULT_ERROR_MESSAGE = "Error running query";

export function createQueryOptions(
  overrides: Partial<RunQueryOptions> = {},
): RunQueryOptions {
  return { ...DEFAULT_QUERY_OPTIONS, ...overrides };
}

/**
 * Compose the message stored for a failed call. An empty caller message
 * falls back to a default so a failure never leaves the error field empty.
 */
export function composeErrorMessage(
  options: Pick<RunQueryOptions, "errorMessage" | "withSqlError">,
  nativeDetail: string,
): string {
  if (options.withSqlError) {
    const prefix = options.errorMessage || `${DEFAULT_ERROR_MESSAGE}: `;
    return prefix + nativeDetail;
  }
  return options.errorMessage || DEFAULT_ERROR_MESSAGE;
}
