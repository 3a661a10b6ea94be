import { AstBuilder, Dialect, GherkinClassicTokenMatcher, Parser, dialects } from "@cucumber/gherkin";
import * as messages from "@cucumber/messages";
import { IFeatureParser } from "./interfaces/IFeatureParser";
import {
    Background,
    ExamplesTable,
    Feature,
    ScenarioDefinition,
    Step,
    StepArgument,
    StepKeyword,
} from "./interfaces/IFeature";
import { FeatureSyntaxError, StructureError } from "./errors";
import { outlinePlaceholders } from "./OutlineExpander";

type GherkinError = Error & { location?: { line: number; column?: number } };

type StepKeywordField = "given" | "when" | "then" | "and" | "but";

const STEP_KEYWORD_FIELDS: ReadonlyArray<[StepKeywordField, StepKeyword]> = [
    ["given", "Given"],
    ["when", "When"],
    ["then", "Then"],
    ["and", "And"],
    ["but", "But"],
];

function isGherkinError(value: unknown): value is GherkinError {
    return value instanceof Error && "location" in value;
}

// The parser collects every error into a composite exception; the first one wins.
function firstGherkinError(err: unknown): GherkinError | undefined {
    if (err instanceof Error && "errors" in err && Array.isArray(err.errors)) {
        return err.errors.find(isGherkinError);
    }
    return isGherkinError(err) ? err : undefined;
}

function withoutPosition(message: string): string {
    return message.replace(/^\(\d+:\d+\): /, "");
}

function trimDescription(description: string | undefined): string {
    if (!description) return "";
    return description
        .split("\n")
        .map((line) => line.trim())
        .join("\n")
        .trim();
}

export class GherkinFeatureParser implements IFeatureParser {
    public parse(text: string, uri?: string): Feature {
        const parser = new Parser(
            new AstBuilder(messages.IdGenerator.incrementing()),
            new GherkinClassicTokenMatcher()
        );

        let document: messages.GherkinDocument;
        try {
            document = parser.parse(text);
        } catch (err) {
            const gherkinError = firstGherkinError(err);
            if (!gherkinError) {
                throw err;
            }
            throw new FeatureSyntaxError(withoutPosition(gherkinError.message), {
                uri,
                line: gherkinError.location?.line,
                column: gherkinError.location?.column,
            });
        }

        return this.fromDocument(document, uri);
    }

    public fromDocument(document: messages.GherkinDocument, uri?: string): Feature {
        const feature = document.feature;
        if (!feature) {
            throw new FeatureSyntaxError("expected a 'Feature:' line", { uri, line: 1, column: 1 });
        }

        const dialect = dialects[feature.language];
        if (!dialect) {
            throw new FeatureSyntaxError(`unknown language "${feature.language}"`, { uri, ...feature.location });
        }

        let background: Background | undefined;
        const scenarios: ScenarioDefinition[] = [];

        for (const child of feature.children) {
            if (child.background) {
                background = {
                    name: child.background.name,
                    steps: child.background.steps.map((step) => this.convertStep(step, dialect, uri)),
                };
            } else if (child.scenario) {
                scenarios.push(this.convertScenario(child.scenario, dialect, uri));
            } else if (child.rule) {
                throw new StructureError(`'Rule:' blocks are not supported ("${child.rule.name}")`, {
                    uri,
                    ...child.rule.location,
                });
            }
        }

        if (scenarios.length === 0) {
            throw new FeatureSyntaxError(
                `feature "${feature.name}" has no 'Scenario:' or 'Scenario Outline:'`,
                { uri, ...feature.location }
            );
        }

        return {
            title: feature.name,
            description: trimDescription(feature.description),
            tags: feature.tags.map((tag) => tag.name),
            language: feature.language,
            ...(background ? { background } : {}),
            scenarios,
        };
    }

    private convertScenario(
        scenario: messages.Scenario,
        dialect: Dialect,
        uri: string | undefined
    ): ScenarioDefinition {
        const common = {
            name: scenario.name,
            description: trimDescription(scenario.description),
            tags: scenario.tags.map((tag) => tag.name),
            steps: scenario.steps.map((step) => this.convertStep(step, dialect, uri)),
        };

        const isOutline = dialect.scenarioOutline.includes(scenario.keyword) || scenario.examples.length > 0;
        if (!isOutline) {
            return { kind: "scenario", ...common };
        }

        const examples = scenario.examples.map((table) => this.convertExamples(table, uri));
        if (examples.every((table) => table.rows.length === 0)) {
            throw new StructureError(`Scenario outline "${scenario.name}" has no Examples rows`, {
                uri,
                ...scenario.location,
            });
        }

        const placeholders = outlinePlaceholders(common);
        scenario.examples.forEach((table, index) => {
            const missing = placeholders.find((name) => !examples[index].columns.includes(name));
            if (missing !== undefined) {
                throw new StructureError(
                    `Scenario outline "${scenario.name}" references <${missing}> but the Examples table has no "${missing}" column`,
                    { uri, ...table.location }
                );
            }
        });

        return { kind: "outline", ...common, examples };
    }

    private convertExamples(table: messages.Examples, uri: string | undefined): ExamplesTable {
        const columns = table.tableHeader ? table.tableHeader.cells.map((cell) => cell.value) : [];

        const duplicate = columns.find((column, index) => columns.indexOf(column) !== index);
        if (duplicate !== undefined) {
            throw new StructureError(`Examples table repeats the column "${duplicate}"`, {
                uri,
                ...table.tableHeader?.location,
            });
        }

        return {
            name: table.name,
            tags: table.tags.map((tag) => tag.name),
            columns,
            rows: table.tableBody.map((row) =>
                Object.fromEntries(
                    columns.map((column, index): [string, string] => [column, row.cells[index].value])
                )
            ),
        };
    }

    private convertStep(step: messages.Step, dialect: Dialect, uri: string | undefined): Step {
        const keyword = this.canonicalKeyword(step.keyword, dialect);
        if (!keyword) {
            throw new FeatureSyntaxError(`unsupported step keyword "${step.keyword.trim()}"`, {
                uri,
                ...step.location,
            });
        }

        const argument = this.convertArgument(step);
        return argument ? { keyword, text: step.text, argument } : { keyword, text: step.text };
    }

    private canonicalKeyword(raw: string, dialect: Dialect): StepKeyword | undefined {
        if (raw.trim() === "*") return "*";
        const entry = STEP_KEYWORD_FIELDS.find(([field]) => dialect[field].includes(raw));
        return entry?.[1];
    }

    private convertArgument(step: messages.Step): StepArgument | undefined {
        if (step.dataTable) {
            return {
                kind: "dataTable",
                rows: step.dataTable.rows.map((row) => row.cells.map((cell) => cell.value)),
            };
        }
        if (step.docString) {
            const { content, mediaType } = step.docString;
            return mediaType ? { kind: "docString", content, mediaType } : { kind: "docString", content };
        }
        return undefined;
    }
}
