// ─── Error Types ─────────────────────────────────────────────────────────────
//
// MalformedRowError is recorded and the row skipped; the others end the run.
// ─────────────────────────────────────────────────────────────────────────────

export type MalformedRowReason = "timestamp" | "cloud-coverage" | "timestamp-order" | "solar-sine";

export class MalformedRowError extends Error {
  constructor(
    public readonly line: number,
    public readonly reason: MalformedRowReason,
    public readonly value: string,
  ) {
    super(describeMalformed(line, reason, value));
    this.name = "MalformedRowError";
  }
}

function describeMalformed(line: number, reason: MalformedRowReason, value: string): string {
  switch (reason) {
    case "timestamp":
      return `Line ${line}: unparsable timestamp "${value}"`;
    case "cloud-coverage":
      return `Line ${line}: cloud coverage is not a number: "${value}"`;
    case "timestamp-order":
      return `Line ${line}: timestamp ${value} does not advance past the previous row`;
    case "solar-sine":
      return `Line ${line}: solar_sine is not a number: "${value}"`;
  }
}

export interface ConfigIssue {
  field: string;
  message: string;
}

export class ConfigurationRangeError extends Error {
  constructor(public readonly issues: ConfigIssue[]) {
    super(
      `Invalid configuration:\n` +
        issues.map(i => `  ${i.field}: ${i.message}`).join("\n"),
    );
    this.name = "ConfigurationRangeError";
  }
}

export class EmptyInputError extends Error {
  constructor(public readonly skippedRows: number = 0) {
    super(
      skippedRows > 0
        ? `No valid rows to compose (${skippedRows} malformed row(s) skipped)`
        : "No valid rows to compose",
    );
    this.name = "EmptyInputError";
  }
}

export class CsvFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CsvFormatError";
  }
}
