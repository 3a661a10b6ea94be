import { TestCase } from "../TestCaseCompiler";

export type ExportFormat = "csv" | "xlsx";

export interface IScenarioExporter {
    toRows(testCases: ReadonlyArray<TestCase>): string[][];
    export(testCases: ReadonlyArray<TestCase>, outFile: string, format: ExportFormat): Promise<number>;
}
