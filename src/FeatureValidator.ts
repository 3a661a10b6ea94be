import { ExamplesTable, Feature, ScenarioOutline } from "./interfaces/IFeature";
import { Violation, ViolationLocation } from "./interfaces/IViolation";
import { findPlaceholders, stepPlaceholders } from "./OutlineExpander";

function duplicates(values: ReadonlyArray<string>): string[] {
    return Array.from(new Set(values.filter((value, index) => values.indexOf(value) !== index)));
}

// Every placeholder the expansion would substitute, doc strings and the name included.
function referencedColumns(outline: ScenarioOutline): Set<string> {
    const referenced = new Set(findPlaceholders(outline.name));
    for (const step of outline.steps) {
        stepPlaceholders(step).forEach((name) => referenced.add(name));
        if (step.argument?.kind === "docString") {
            findPlaceholders(step.argument.content).forEach((name) => referenced.add(name));
        }
    }
    return referenced;
}

function checkExamples(
    outline: ScenarioOutline,
    table: ExamplesTable,
    at: ViolationLocation,
    violations: Violation[]
): void {
    for (const tag of duplicates(table.tags)) {
        violations.push({ kind: "duplicate-tag", message: `Examples repeat the tag ${tag}`, location: at });
    }

    for (const column of duplicates(table.columns)) {
        violations.push({
            kind: "duplicate-column",
            message: `Examples table repeats the column "${column}"`,
            location: at,
        });
    }

    outline.steps.forEach((step, stepIndex) => {
        for (const name of stepPlaceholders(step)) {
            if (!table.columns.includes(name)) {
                violations.push({
                    kind: "missing-column",
                    message: `Step "${step.text}" references <${name}> but the Examples table has no "${name}" column`,
                    location: { ...at, step: stepIndex },
                });
            }
        }
    });

    table.rows.forEach((row, rowIndex) => {
        for (const column of table.columns.filter((name) => !Object.hasOwn(row, name))) {
            violations.push({
                kind: "missing-value",
                message: `Examples row ${rowIndex + 1} has no value for "${column}"`,
                location: { ...at, row: rowIndex },
            });
        }
    });

    const referenced = referencedColumns(outline);
    for (const column of table.columns.filter((name) => !referenced.has(name))) {
        violations.push({
            kind: "unused-column",
            message: `Examples column "${column}" is not used by any step`,
            location: at,
        });
    }
}

/**
 * Collects every invariant violation in the feature. Unlike `parse`, this
 * never throws, so tooling can report all problems in one pass.
 */
export function validate(feature: Feature): Violation[] {
    const violations: Violation[] = [];
    const root: ViolationLocation = { feature: feature.title };

    for (const tag of duplicates(feature.tags)) {
        violations.push({ kind: "duplicate-tag", message: `Feature repeats the tag ${tag}`, location: root });
    }

    if (feature.background && feature.background.steps.length === 0) {
        violations.push({
            kind: "empty-steps",
            message: "Background has no steps",
            location: { ...root, background: true },
        });
    }

    const seenNames = new Set<string>();

    feature.scenarios.forEach((scenario, scenarioIndex) => {
        const at: ViolationLocation = { ...root, scenario: scenarioIndex };
        const label = scenario.kind === "outline" ? "Scenario outline" : "Scenario";

        if (scenario.name && seenNames.has(scenario.name)) {
            violations.push({
                kind: "duplicate-scenario-name",
                message: `${label} "${scenario.name}" is declared more than once`,
                location: at,
            });
        }
        seenNames.add(scenario.name);

        for (const tag of duplicates(scenario.tags)) {
            violations.push({
                kind: "duplicate-tag",
                message: `${label} "${scenario.name}" repeats the tag ${tag}`,
                location: at,
            });
        }

        if (scenario.steps.length === 0) {
            violations.push({
                kind: "empty-steps",
                message: `${label} "${scenario.name}" has no steps`,
                location: at,
            });
        }

        if (scenario.kind !== "outline") {
            return;
        }

        if (scenario.examples.every((table) => table.rows.length === 0)) {
            violations.push({
                kind: "missing-examples",
                message: `Scenario outline "${scenario.name}" has no Examples rows`,
                location: at,
            });
        }

        scenario.examples.forEach((table, examplesIndex) =>
            checkExamples(scenario, table, { ...at, examples: examplesIndex }, violations)
        );
    });

    return violations;
}
