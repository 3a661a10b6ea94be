import { ExamplesRow, Scenario, ScenarioOutline, Step, StepArgument } from "./interfaces/IFeature";
import { StructureError } from "./errors";

const PLACEHOLDER_REGEX = /<([^<>]+)>/g;

/** Placeholder names in order of first appearance, e.g. `I login with "<username>"` -> ["username"]. */
export function findPlaceholders(text: string): string[] {
    const names: string[] = [];
    for (const match of text.matchAll(PLACEHOLDER_REGEX)) {
        if (!names.includes(match[1])) {
            names.push(match[1]);
        }
    }
    return names;
}

/**
 * Placeholders that must resolve for a step: those in its text and in its data
 * table cells. Doc strings often hold markup, so they are substituted but not
 * required to resolve.
 */
export function stepPlaceholders(step: Step): string[] {
    const names = findPlaceholders(step.text);
    if (step.argument?.kind === "dataTable") {
        for (const row of step.argument.rows) {
            for (const cell of row) {
                for (const name of findPlaceholders(cell)) {
                    if (!names.includes(name)) names.push(name);
                }
            }
        }
    }
    return names;
}

export function outlinePlaceholders(outline: Pick<ScenarioOutline, "steps">): string[] {
    const names: string[] = [];
    for (const step of outline.steps) {
        for (const name of stepPlaceholders(step)) {
            if (!names.includes(name)) names.push(name);
        }
    }
    return names;
}

function substitute(text: string, row: ExamplesRow): string {
    return text.replace(PLACEHOLDER_REGEX, (token: string, name: string) =>
        Object.hasOwn(row, name) ? row[name] : token
    );
}

function substituteArgument(argument: StepArgument, row: ExamplesRow): StepArgument {
    if (argument.kind === "dataTable") {
        return {
            kind: "dataTable",
            rows: argument.rows.map((cells) => cells.map((cell) => substitute(cell, row))),
        };
    }
    return { ...argument, content: substitute(argument.content, row) };
}

function substituteStep(step: Step, row: ExamplesRow, outlineName: string): Step {
    const missing = stepPlaceholders(step).filter((name) => !Object.hasOwn(row, name));
    if (missing.length > 0) {
        throw new StructureError(
            `Scenario outline "${outlineName}" step "${step.text}" references <${missing[0]}> but no Examples column is named "${missing[0]}"`
        );
    }

    const expanded: Step = { keyword: step.keyword, text: substitute(step.text, row) };
    return step.argument ? { ...expanded, argument: substituteArgument(step.argument, row) } : expanded;
}

/**
 * One concrete scenario per Examples row, tables and rows in file order. Each
 * `<column>` token is replaced literally by the row's value; examples tags are
 * appended to the outline's own tags.
 */
export function expand(outline: ScenarioOutline): Scenario[] {
    const scenarios: Scenario[] = [];

    for (const table of outline.examples) {
        const tags = [...outline.tags, ...table.tags.filter((tag) => !outline.tags.includes(tag))];

        for (const row of table.rows) {
            scenarios.push({
                kind: "scenario",
                name: substitute(outline.name, row),
                description: outline.description,
                tags,
                steps: outline.steps.map((step) => substituteStep(step, row, outline.name)),
            });
        }
    }

    return scenarios;
}
