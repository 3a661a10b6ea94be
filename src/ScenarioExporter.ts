import * as fs from "fs";
import * as xlsx from "xlsx";
import { ExportFormat, IScenarioExporter } from "./interfaces/IScenarioExporter";
import { IGherkinStepConverter } from "./interfaces/IGherkinStepConverter";
import { ILogger } from "./interfaces/ILogger";
import { TestCase } from "./TestCaseCompiler";
import { sanitizeForCsv, toCsvLine } from "./utils/CsvUtils";

export const EXPORT_COLUMNS = ["Feature", "Scenario", "Tags", "Step", "Action", "Expected"];

const SHEET_NAME = "Scenarios";

export class ScenarioExporter implements IScenarioExporter {
    constructor(
        private stepConverter: IGherkinStepConverter,
        private logger: ILogger
    ) { }

    /** One row per manual step; a test case without steps still gets a row. */
    public toRows(testCases: ReadonlyArray<TestCase>): string[][] {
        const rows: string[][] = [];

        for (const testCase of testCases) {
            const tags = testCase.tags.join(" ");
            const manualSteps = this.stepConverter.convert(testCase.steps);

            if (manualSteps.length === 0) {
                rows.push([testCase.featureTitle, testCase.name, tags, "", "", ""]);
                continue;
            }
            manualSteps.forEach((step, index) => {
                rows.push([testCase.featureTitle, testCase.name, tags, String(index + 1), step.action, step.expected]);
            });
        }

        return rows;
    }

    public async export(testCases: ReadonlyArray<TestCase>, outFile: string, format: ExportFormat): Promise<number> {
        const rows = this.toRows(testCases);

        if (format === "xlsx") {
            const sheet = xlsx.utils.aoa_to_sheet([
                EXPORT_COLUMNS,
                ...rows.map((row) => row.map(sanitizeForCsv)),
            ]);
            const workbook = xlsx.utils.book_new();
            xlsx.utils.book_append_sheet(workbook, sheet, SHEET_NAME);
            xlsx.writeFile(workbook, outFile);
        } else {
            const lines = [EXPORT_COLUMNS, ...rows].map(toCsvLine);
            await fs.promises.writeFile(outFile, `${lines.join("\r\n")}\r\n`, "utf-8");
        }

        this.logger.log(`📤 Exported ${testCases.length} test cases (${rows.length} steps) to ${outFile}`);
        return rows.length;
    }
}
