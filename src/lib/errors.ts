/**
 * Error types for batch processing.
 *
 * Only conditions that would make the output silently wrong are raised;
 * everything else is reported through diagnostics on the batch result.
 */

export class BatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BatchError';
  }
}

/**
 * An input table is missing a required column or holds an unusable value.
 *
 * @param table - Which input the problem was found in ("dilution factors", ...)
 * @param expected - The columns the table must provide
 * @param found - The columns actually present
 */
export class SchemaError extends BatchError {
  constructor(
    message: string,
    public readonly table: string,
    public readonly expected: readonly string[],
    public readonly found: readonly string[]
  ) {
    super(message);
    this.name = 'SchemaError';
  }

  static missingColumns(
    table: string,
    expected: readonly string[],
    found: readonly string[]
  ): SchemaError {
    return new SchemaError(
      `${table} table must have columns [${expected.join(', ')}]. Found columns: [${found.join(', ')}]`,
      table,
      expected,
      found
    );
  }
}

/**
 * Two instrument headers mapped to the same channel id.
 */
export class HeaderCollisionError extends BatchError {
  constructor(
    public readonly channelId: string,
    public readonly headers: readonly [string, string]
  ) {
    super(`Headers "${headers[0]}" and "${headers[1]}" both map to channel ${channelId}`);
    this.name = 'HeaderCollisionError';
  }
}

export class ConfigError extends BatchError {
  constructor(message: string, public readonly issues: readonly string[]) {
    super(message);
    this.name = 'ConfigError';
  }
}
