import { Feature } from "./IFeature";
import { Violation } from "./IViolation";
import { FeatureParseError } from "../errors";

export type FeatureLintResult =
    | { ok: true; uri: string; feature: Feature; violations: Violation[] }
    | { ok: false; uri: string; error: FeatureParseError };

export interface ILintReporter {
    render(results: ReadonlyArray<FeatureLintResult>): string;
    write(results: ReadonlyArray<FeatureLintResult>, outFile: string): Promise<void>;
}
