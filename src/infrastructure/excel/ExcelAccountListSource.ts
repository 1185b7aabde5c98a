import { access } from "fs/promises";
import { Workbook } from "exceljs";
import {
  type AccountListSource,
  InputColumnNotFoundError,
  InputFileNotFoundError
} from "../../ports/AccountListSource";
import type { WorkItem } from "../../core/work/work.types";

/**
 * Reads one named column from the first worksheet. Row 1 is the header;
 * blank cells are skipped.
 */
export class ExcelAccountListSource implements AccountListSource {
  async readColumn(filePath: string, column: string): Promise<WorkItem[]> {
    try {
      await access(filePath);
    } catch {
      throw new InputFileNotFoundError(filePath);
    }

    const workbook = new Workbook();
    await workbook.xlsx.readFile(filePath);
    const sheet = workbook.worksheets[0];
    if (!sheet) {
      throw new InputColumnNotFoundError(filePath, column);
    }

    const header = sheet.getRow(1);
    let columnNumber = 0;
    for (let colNumber = 1; colNumber <= header.cellCount; colNumber += 1) {
      if (header.getCell(colNumber).text.trim() === column) {
        columnNumber = colNumber;
        break;
      }
    }
    if (columnNumber === 0) {
      throw new InputColumnNotFoundError(filePath, column);
    }

    const items: WorkItem[] = [];
    for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber += 1) {
      const text = sheet.getRow(rowNumber).getCell(columnNumber).text.trim();
      if (text !== "") items.push(text);
    }
    return items;
  }
}
