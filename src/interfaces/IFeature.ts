export type StepKeyword = "Given" | "When" | "Then" | "And" | "But" | "*";

export interface DataTable {
    readonly kind: "dataTable";
    readonly rows: ReadonlyArray<ReadonlyArray<string>>;
}

export interface DocString {
    readonly kind: "docString";
    readonly content: string;
    readonly mediaType?: string;
}

export type StepArgument = DataTable | DocString;

export interface Step {
    readonly keyword: StepKeyword;
    readonly text: string;
    readonly argument?: StepArgument;
}

export interface Background {
    readonly name: string;
    readonly steps: ReadonlyArray<Step>;
}

export type ExamplesRow = Readonly<Record<string, string>>;

export interface ExamplesTable {
    readonly name: string;
    readonly tags: ReadonlyArray<string>;
    readonly columns: ReadonlyArray<string>;
    readonly rows: ReadonlyArray<ExamplesRow>;
}

export interface Scenario {
    readonly kind: "scenario";
    readonly name: string;
    readonly description: string;
    readonly tags: ReadonlyArray<string>;
    readonly steps: ReadonlyArray<Step>;
}

export interface ScenarioOutline {
    readonly kind: "outline";
    readonly name: string;
    readonly description: string;
    readonly tags: ReadonlyArray<string>;
    readonly steps: ReadonlyArray<Step>;
    readonly examples: ReadonlyArray<ExamplesTable>;
}

export type ScenarioDefinition = Scenario | ScenarioOutline;

export interface Feature {
    readonly title: string;
    // Narrative lines ("As a / I want / So that"), trimmed, joined by "\n".
    readonly description: string;
    readonly tags: ReadonlyArray<string>;
    readonly language: string;
    readonly background?: Background;
    readonly scenarios: ReadonlyArray<ScenarioDefinition>;
}
