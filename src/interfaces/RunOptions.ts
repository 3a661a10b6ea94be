import { ExportFormat } from "./IScenarioExporter";

export interface RunOptions {
    pattern: string;
    tagExpression: string;
    junitOut?: string;
    outFile?: string;
    format: ExportFormat;
    withBackground: boolean;
}
