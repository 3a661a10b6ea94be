import { IFeatureLoader, FeatureLoadResult } from "./interfaces/IFeatureLoader";
import { ILintReporter, FeatureLintResult } from "./interfaces/ILintReporter";
import { IScenarioExporter } from "./interfaces/IScenarioExporter";
import { ILogger } from "./interfaces/ILogger";
import { RunOptions } from "./interfaces/RunOptions";
import { Feature } from "./interfaces/IFeature";
import { validate } from "./FeatureValidator";
import { compileTestCases, TestCase } from "./TestCaseCompiler";
import { formatTagExpression, parseTagExpression } from "./TagExpression";
import { formatViolation } from "./JUnitLintReporter";

export type ListedTestCase = TestCase & { uri: string };

export function formatTestCase(testCase: ListedTestCase, withSteps: boolean): string {
    const tags = testCase.tags.length > 0 ? ` ${testCase.tags.join(" ")}` : "";
    const header = `${testCase.uri} › ${testCase.featureTitle} › ${testCase.name}${tags}`;
    if (!withSteps) {
        return header;
    }
    return [header, ...testCase.steps.map((step) => `    ${step.keyword} ${step.text}`)].join("\n");
}

export class App {
    constructor(
        private loader: IFeatureLoader,
        private reporter: ILintReporter,
        private exporter: IScenarioExporter,
        private logger: ILogger
    ) { }

    /** Validates every matching file; resolves to true when nothing was found wrong. */
    async lint(options: RunOptions): Promise<boolean> {
        const loaded = await this.loader.load(options.pattern);
        if (loaded.length === 0) {
            return true;
        }

        const results: FeatureLintResult[] = loaded.map((result) =>
            result.ok ? { ...result, violations: validate(result.feature) } : result
        );

        let problems = 0;
        for (const result of results) {
            if (!result.ok) {
                problems++;
                this.logger.error(result.error.message);
                continue;
            }
            for (const violation of result.violations) {
                problems++;
                this.logger.warn(formatViolation(result.uri, violation));
            }
        }

        if (options.junitOut) {
            await this.reporter.write(results, options.junitOut);
            this.logger.log(`📝 Wrote JUnit lint report to ${options.junitOut}`);
        }

        if (problems === 0) {
            this.logger.log(`✅ ${results.length} feature files are well-formed.`);
            return true;
        }
        this.logger.log(`🔍 Found ${problems} problems in ${results.length} feature files.`);
        return false;
    }

    /** Concrete test cases selected by the tag expression, in file and declaration order. */
    async list(options: RunOptions): Promise<ListedTestCase[]> {
        const features = await this.loadFeatures(options);

        const testCases = features.flatMap(({ uri, feature }) =>
            compileTestCases(feature, options.tagExpression).map((testCase) => ({ ...testCase, uri }))
        );
        this.logger.log(`🧪 Selected ${testCases.length} test cases.`);
        return testCases;
    }

    async export(options: RunOptions): Promise<number> {
        if (!options.outFile) {
            throw new Error("An output file is required for export (--out).");
        }

        const testCases = await this.list(options);
        return this.exporter.export(testCases, options.outFile, options.format);
    }

    // Fails on the first file that does not parse; listing a partial suite would hide it.
    private async loadFeatures(options: RunOptions): Promise<{ uri: string; feature: Feature }[]> {
        const expression = parseTagExpression(options.tagExpression);
        if (expression.kind !== "any") {
            this.logger.log(`🏷️ Tag filter: ${formatTagExpression(expression)}`);
        }

        const loaded: FeatureLoadResult[] = await this.loader.load(options.pattern);
        const features: { uri: string; feature: Feature }[] = [];
        for (const result of loaded) {
            if (!result.ok) {
                throw result.error;
            }
            features.push({ uri: result.uri, feature: result.feature });
        }
        return features;
    }
}
