import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import { Workbook } from "exceljs";
import { ExcelAccountListSource } from "../../src/infrastructure/excel/ExcelAccountListSource";
import { ExcelResultSink, resultSheetName } from "../../src/infrastructure/excel/ExcelResultSink";
import { InputColumnNotFoundError, InputFileNotFoundError } from "../../src/ports/AccountListSource";
import { silenceConsole } from "../helpers/fakes";

const writeInput = async (filePath: string, header: string[], rows: Array<Array<string | number | null>>) => {
  const workbook = new Workbook();
  const sheet = workbook.addWorksheet("Accounts");
  sheet.addRow(header);
  for (const row of rows) sheet.addRow(row);
  await workbook.xlsx.writeFile(filePath);
};

describe("Excel adapters", () => {
  let dir: string;
  let consoleSpies: ReturnType<typeof silenceConsole>;

  beforeEach(async () => {
    consoleSpies = silenceConsole();
    dir = await mkdtemp(path.join(tmpdir(), "linetest-excel-"));
  });

  afterEach(async () => {
    consoleSpies.restore();
    await rm(dir, { recursive: true, force: true });
  });

  it("reads the named column in row order, skipping blank cells", async () => {
    const filePath = path.join(dir, "input.xlsx");
    await writeInput(filePath, ["province", "username"], [
      ["NAN", " acc-1 "],
      ["NAN", null],
      ["NAN", 12345],
      ["NAN", "acc-3"]
    ]);

    await expect(new ExcelAccountListSource().readColumn(filePath, "username")).resolves.toEqual([
      "acc-1",
      "12345",
      "acc-3"
    ]);
  });

  it("rejects a missing file and a missing column with typed errors", async () => {
    const source = new ExcelAccountListSource();
    await expect(source.readColumn(path.join(dir, "absent.xlsx"), "username")).rejects.toBeInstanceOf(
      InputFileNotFoundError
    );

    const filePath = path.join(dir, "input.xlsx");
    await writeInput(filePath, ["account"], [["acc-1"]]);
    await expect(source.readColumn(filePath, "username")).rejects.toMatchObject({
      code: "input_column_not_found",
      column: "username",
      message: `Column "username" not found in ${filePath}`
    });
    await expect(source.readColumn(filePath, "username")).rejects.toBeInstanceOf(InputColumnNotFoundError);
  });

  it("writes one header row and one row per result", async () => {
    const filePath = path.join(dir, "output.xlsx");
    await new ExcelResultSink().write(
      filePath,
      [
        { username: "acc-1", port: "1/1", "signal.rx": -21.5 },
        { username: "acc-2", port: "1/2" }
      ],
      ["username", "port", "signal.rx"]
    );

    const workbook = new Workbook();
    await workbook.xlsx.readFile(filePath);
    const sheet = workbook.getWorksheet(resultSheetName);
    if (!sheet) throw new Error("result sheet missing");

    const rowValues = (n: number) =>
      [1, 2, 3].map((col) => sheet.getRow(n).getCell(col).text);
    expect(sheet.rowCount).toBe(3);
    expect(rowValues(1)).toEqual(["username", "port", "signal.rx"]);
    expect(rowValues(2)).toEqual(["acc-1", "1/1", "-21.5"]);
    expect(rowValues(3)).toEqual(["acc-2", "1/2", ""]);
  });

  it("round-trips the username column through the sink and the source", async () => {
    const filePath = path.join(dir, "roundtrip.xlsx");
    await new ExcelResultSink().write(filePath, [{ username: "acc-9" }, { username: "acc-10" }], ["username"]);

    await expect(new ExcelAccountListSource().readColumn(filePath, "username")).resolves.toEqual(["acc-9", "acc-10"]);
  });
});
