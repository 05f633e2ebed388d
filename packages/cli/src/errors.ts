/**
 * @tally/cli — Input errors.
 */

/**
 * A CSV line that cannot be turned into a transaction record.
 * Always fatal for the run.
 */
export class RecordParseError extends Error {
  public readonly code = "MALFORMED_RECORD" as const;
  /** 1-based line number in the input. */
  public readonly line: number;

  constructor(line: number, message: string) {
    super(`Line ${String(line)}: ${message}`);
    this.name = "RecordParseError";
    this.line = line;
  }
}
