import * as fs from "fs";
import * as xml2js from "xml2js";
import { FeatureLintResult, ILintReporter } from "./interfaces/ILintReporter";
import { Violation, ViolationLocation } from "./interfaces/IViolation";

type JUnitFailure = { $: { type: string; message: string }; _: string };
type JUnitTestCase = { $: { classname: string; name: string }; failure?: JUnitFailure[] };

export function describeLocation(location: ViolationLocation): string {
    const parts: string[] = [];
    if (location.background) parts.push("background");
    if (location.scenario !== undefined) parts.push(`scenario ${location.scenario + 1}`);
    if (location.examples !== undefined) parts.push(`examples ${location.examples + 1}`);
    if (location.row !== undefined) parts.push(`row ${location.row + 1}`);
    if (location.step !== undefined) parts.push(`step ${location.step + 1}`);
    return parts.length > 0 ? parts.join(", ") : "feature";
}

export function formatViolation(uri: string, violation: Violation): string {
    return `${uri} [${describeLocation(violation.location)}] ${violation.kind}: ${violation.message}`;
}

function toFailure(violation: Violation): JUnitFailure {
    return {
        $: { type: violation.kind, message: violation.message },
        _: describeLocation(violation.location),
    };
}

function withFailures(testCase: JUnitTestCase, violations: Violation[]): JUnitTestCase {
    return violations.length > 0 ? { ...testCase, failure: violations.map(toFailure) } : testCase;
}

/**
 * Renders lint results as JUnit XML: a suite per feature file, a test case for
 * the feature itself and one per scenario definition, a failure per violation.
 * Files that did not parse get a single failing "parse" test case.
 */
export class JUnitLintReporter implements ILintReporter {
    public render(results: ReadonlyArray<FeatureLintResult>): string {
        let totalTests = 0;
        let totalFailures = 0;

        const suites = results.map((result) => {
            let testCases: JUnitTestCase[];

            if (!result.ok) {
                testCases = [{
                    $: { classname: result.uri, name: "parse" },
                    failure: [{ $: { type: result.error.name, message: result.error.reason }, _: result.error.message }],
                }];
            } else {
                const { feature, violations } = result;
                testCases = [
                    withFailures(
                        { $: { classname: feature.title, name: "feature" } },
                        violations.filter((v) => v.location.scenario === undefined)
                    ),
                    ...feature.scenarios.map((scenario, index) =>
                        withFailures(
                            { $: { classname: feature.title, name: scenario.name } },
                            violations.filter((v) => v.location.scenario === index)
                        )
                    ),
                ];
            }

            const failures = testCases.filter((testCase) => testCase.failure).length;
            totalTests += testCases.length;
            totalFailures += failures;

            return {
                $: { name: result.uri, tests: String(testCases.length), failures: String(failures) },
                testcase: testCases,
            };
        });

        const builder = new xml2js.Builder({ xmldec: { version: "1.0", encoding: "UTF-8" } });
        return builder.buildObject({
            testsuites: {
                $: { name: "gherkin-lint", tests: String(totalTests), failures: String(totalFailures) },
                testsuite: suites,
            },
        });
    }

    public async write(results: ReadonlyArray<FeatureLintResult>, outFile: string): Promise<void> {
        await fs.promises.writeFile(outFile, this.render(results), "utf-8");
    }
}
