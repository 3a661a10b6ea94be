export type SourcePosition = {
    uri?: string;
    line?: number;
    column?: number;
};

/**
 * Base class for everything `parse` can throw. The message is prefixed with
 * the source position when one is known, e.g. `login.feature (12:5): ...`.
 */
export class FeatureParseError extends Error {
    public readonly uri?: string;
    public readonly line?: number;
    public readonly column?: number;
    public readonly reason: string;

    constructor(reason: string, position: SourcePosition = {}) {
        super(FeatureParseError.format(reason, position));
        this.name = "FeatureParseError";
        this.reason = reason;
        this.uri = position.uri;
        this.line = position.line;
        this.column = position.column;
    }

    private static format(reason: string, { uri, line, column }: SourcePosition): string {
        const where = line !== undefined ? `(${line}:${column ?? 0})` : "";
        const prefix = [uri, where].filter((part) => part).join(" ");
        return prefix ? `${prefix}: ${reason}` : reason;
    }
}

/** Malformed Gherkin: missing or mis-ordered keywords, ragged tables. */
export class FeatureSyntaxError extends FeatureParseError {
    constructor(reason: string, position: SourcePosition = {}) {
        super(reason, position);
        this.name = "FeatureSyntaxError";
    }
}

/** Well-formed Gherkin that breaks a model invariant. */
export class StructureError extends FeatureParseError {
    constructor(reason: string, position: SourcePosition = {}) {
        super(reason, position);
        this.name = "StructureError";
    }
}

export class TagExpressionError extends Error {
    constructor(public readonly expression: string, reason: string) {
        super(`Could not parse tag filter "${expression}": ${reason}`);
        this.name = "TagExpressionError";
    }
}
