import type { ResultRow } from "../core/results/normalizeResults";

export interface ResultSink {
  write(filePath: string, rows: ResultRow[], columns: string[]): Promise<void>;
}
