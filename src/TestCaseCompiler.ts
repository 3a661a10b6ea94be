import { Feature, Step } from "./interfaces/IFeature";
import { effectiveTags, filterByTag } from "./ScenarioFilter";

export interface TestCase {
    featureTitle: string;
    featureDescription: string;
    name: string;
    tags: string[];
    steps: Step[];
}

/**
 * What a harness executes: one test case per scenario or examples row, with
 * the background steps prefixed and feature tags merged in.
 */
export function compileTestCases(feature: Feature, tagExpression = ""): TestCase[] {
    const backgroundSteps = feature.background ? feature.background.steps : [];

    return filterByTag(feature, tagExpression).map((scenario) => ({
        featureTitle: feature.title,
        featureDescription: feature.description,
        name: scenario.name,
        tags: effectiveTags(feature, scenario),
        steps: [...backgroundSteps, ...scenario.steps],
    }));
}
