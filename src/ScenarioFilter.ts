import { Feature, Scenario, ScenarioDefinition } from "./interfaces/IFeature";
import { expand } from "./OutlineExpander";
import { evaluateTagExpression, parseTagExpression } from "./TagExpression";

/** Outlines replaced by their expansions, declaration order kept. */
export function concreteScenarios(definitions: ReadonlyArray<ScenarioDefinition>): Scenario[] {
    return definitions.flatMap((definition) =>
        definition.kind === "outline" ? expand(definition) : [definition]
    );
}

export function effectiveTags(feature: Pick<Feature, "tags">, scenario: Pick<Scenario, "tags">): string[] {
    return Array.from(new Set([...feature.tags, ...scenario.tags]));
}

/**
 * Concrete scenarios whose tags, together with the feature's, satisfy the
 * expression. Filtering a feature rebuilt from the result with the same
 * expression returns the same scenarios.
 */
export function filterByTag(feature: Feature, tagExpression: string): Scenario[] {
    const expression = parseTagExpression(tagExpression);

    return concreteScenarios(feature.scenarios).filter((scenario) =>
        evaluateTagExpression(expression, effectiveTags(feature, scenario))
    );
}
