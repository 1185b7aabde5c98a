import { Workbook } from "exceljs";
import type { ResultSink } from "../../ports/ResultSink";
import type { ResultRow } from "../../core/results/normalizeResults";

export const resultSheetName = "Responses";

export class ExcelResultSink implements ResultSink {
  async write(filePath: string, rows: ResultRow[], columns: string[]): Promise<void> {
    const workbook = new Workbook();
    const sheet = workbook.addWorksheet(resultSheetName);

    sheet.columns = columns.map((key) => ({ header: key, key, width: 20 }));
    sheet.getRow(1).font = { bold: true };

    for (const row of rows) {
      sheet.addRow(row);
    }

    await workbook.xlsx.writeFile(filePath);
    console.log(JSON.stringify({ event: "output.written", file: filePath, rows: rows.length, columns: columns.length }));
  }
}
