import { Dialect, dialects } from "@cucumber/gherkin";
import {
    Background,
    ExamplesTable,
    Feature,
    ScenarioDefinition,
    Step,
    StepKeyword,
} from "./interfaces/IFeature";

type Keywords = {
    feature: string;
    background: string;
    scenario: string;
    scenarioOutline: string;
    examples: string;
    steps: Record<StepKeyword, string>;
};

type DocStringDelimiter = '"""' | "```";

const ENGLISH: Keywords = {
    feature: "Feature",
    background: "Background",
    scenario: "Scenario",
    scenarioOutline: "Scenario Outline",
    examples: "Examples",
    steps: { Given: "Given ", When: "When ", Then: "Then ", And: "And ", But: "But ", "*": "* " },
};

function stepKeyword(candidates: readonly string[]): string {
    return candidates.find((keyword) => keyword !== "* ") ?? "* ";
}

function keywordsFor(language: string): Keywords {
    const dialect: Dialect | undefined = dialects[language];
    if (language === "en" || !dialect) {
        return ENGLISH;
    }
    return {
        feature: dialect.feature[0],
        background: dialect.background[0],
        scenario: dialect.scenario[0],
        scenarioOutline: dialect.scenarioOutline[0],
        examples: dialect.examples[0],
        steps: {
            Given: stepKeyword(dialect.given),
            When: stepKeyword(dialect.when),
            Then: stepKeyword(dialect.then),
            And: stepKeyword(dialect.and),
            But: stepKeyword(dialect.but),
            "*": "* ",
        },
    };
}

function escapeCell(value: string): string {
    return value.replace(/\\/g, "\\\\").replace(/\|/g, "\\|").replace(/\n/g, "\\n");
}

function header(indent: string, keyword: string, name: string): string {
    return `${indent}${keyword}:${name ? ` ${name}` : ""}`;
}

function descriptionLines(indent: string, description: string): string[] {
    if (!description) return [];
    return description.split("\n").map((line) => (line ? `${indent}${line}` : ""));
}

function tagLine(indent: string, tags: ReadonlyArray<string>): string[] {
    return tags.length > 0 ? [`${indent}${tags.join(" ")}`] : [];
}

function tableLines(indent: string, rows: ReadonlyArray<ReadonlyArray<string>>): string[] {
    const escaped = rows.map((row) => row.map(escapeCell));
    const widths: number[] = [];
    for (const row of escaped) {
        row.forEach((cell, index) => {
            widths[index] = Math.max(widths[index] ?? 0, cell.length);
        });
    }
    return escaped.map((row) => `${indent}| ${row.map((cell, index) => cell.padEnd(widths[index])).join(" | ")} |`);
}

// A delimiter the content does not contain, or `"""` when it holds both.
function docStringDelimiter(content: string): DocStringDelimiter {
    if (!content.includes('"""')) return '"""';
    if (!content.includes("```")) return "```";
    return '"""';
}

// Only the first delimiter on a line can close the doc string, and only it is unescaped on parse.
function escapeDocStringLine(line: string, delimiter: DocStringDelimiter): string {
    if (!line.includes(delimiter)) return line;
    return line.replace(delimiter, delimiter.split("").map((char) => `\\${char}`).join(""));
}

function stepLines(indent: string, step: Step, keywords: Keywords): string[] {
    const lines = [`${indent}${keywords.steps[step.keyword]}${step.text}`];
    const argumentIndent = `${indent}  `;

    if (step.argument?.kind === "dataTable") {
        lines.push(...tableLines(argumentIndent, step.argument.rows));
    } else if (step.argument?.kind === "docString") {
        const { content, mediaType } = step.argument;
        const delimiter = docStringDelimiter(content);
        lines.push(`${argumentIndent}${delimiter}${mediaType ?? ""}`);
        for (const line of content.split("\n")) {
            lines.push(line ? `${argumentIndent}${escapeDocStringLine(line, delimiter)}` : "");
        }
        lines.push(`${argumentIndent}${delimiter}`);
    }

    return lines;
}

function backgroundLines(background: Background, keywords: Keywords): string[] {
    return [
        header("  ", keywords.background, background.name),
        ...background.steps.flatMap((step) => stepLines("    ", step, keywords)),
    ];
}

function examplesLines(table: ExamplesTable, keywords: Keywords): string[] {
    const values = table.rows.map((row) =>
        table.columns.map((column) => (Object.hasOwn(row, column) ? row[column] : ""))
    );
    // An Examples section may come without a table; keep it that way.
    const rows = table.columns.length > 0 ? [table.columns, ...values] : [];
    return [
        ...tagLine("    ", table.tags),
        header("    ", keywords.examples, table.name),
        ...tableLines("      ", rows),
    ];
}

function scenarioLines(scenario: ScenarioDefinition, keywords: Keywords): string[] {
    const keyword = scenario.kind === "outline" ? keywords.scenarioOutline : keywords.scenario;
    const lines = [
        ...tagLine("  ", scenario.tags),
        header("  ", keyword, scenario.name),
        ...descriptionLines("    ", scenario.description),
        ...scenario.steps.flatMap((step) => stepLines("    ", step, keywords)),
    ];

    if (scenario.kind === "outline") {
        for (const table of scenario.examples) {
            lines.push("", ...examplesLines(table, keywords));
        }
    }

    return lines;
}

/**
 * Canonical Gherkin text for a feature: two-space indentation, aligned tables
 * and `"""` doc strings. Parsing the output yields an equal model.
 */
export function serialize(feature: Feature): string {
    const keywords = keywordsFor(feature.language);
    const lines: string[] = [];

    if (feature.language !== "en") {
        lines.push(`# language: ${feature.language}`);
    }
    lines.push(...tagLine("", feature.tags), header("", keywords.feature, feature.title));
    lines.push(...descriptionLines("  ", feature.description));

    if (feature.background) {
        lines.push("", ...backgroundLines(feature.background, keywords));
    }
    for (const scenario of feature.scenarios) {
        lines.push("", ...scenarioLines(scenario, keywords));
    }

    return `${lines.join("\n")}\n`;
}
