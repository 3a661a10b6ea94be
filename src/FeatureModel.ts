import { Feature } from "./interfaces/IFeature";
import { GherkinFeatureParser } from "./GherkinFeatureParser";

const parser = new GherkinFeatureParser();

/**
 * Parses one feature document. Throws `FeatureSyntaxError` for malformed
 * Gherkin and `StructureError` for a broken model invariant; never returns a
 * partial document.
 */
export function parse(text: string, uri?: string): Feature {
    return parser.parse(text, uri);
}

export { expand } from "./OutlineExpander";
export { filterByTag } from "./ScenarioFilter";
export { validate } from "./FeatureValidator";
export { serialize } from "./FeatureSerializer";
export { compileTestCases } from "./TestCaseCompiler";
export type { TestCase } from "./TestCaseCompiler";
export { parseTagExpression, evaluateTagExpression } from "./TagExpression";
export type { TagExpression } from "./TagExpression";
export { FeatureParseError, FeatureSyntaxError, StructureError, TagExpressionError } from "./errors";
export * from "./interfaces/IFeature";
export * from "./interfaces/IViolation";
