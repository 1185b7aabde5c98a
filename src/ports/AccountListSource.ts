import type { WorkItem } from "../core/work/work.types";

export class InputFileNotFoundError extends Error {
  readonly code = "input_file_not_found";

  constructor(readonly filePath: string) {
    super(`Input file not found: ${filePath}`);
    this.name = "InputFileNotFoundError";
  }
}

export class InputColumnNotFoundError extends Error {
  readonly code = "input_column_not_found";

  constructor(readonly filePath: string, readonly column: string) {
    super(`Column "${column}" not found in ${filePath}`);
    this.name = "InputColumnNotFoundError";
  }
}

export interface AccountListSource {
  /** Rejects with InputFileNotFoundError or InputColumnNotFoundError. */
  readColumn(filePath: string, column: string): Promise<WorkItem[]>;
}
