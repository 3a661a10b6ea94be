import { TagExpressionError } from "./errors";

export type TagExpression =
    | { kind: "any" }
    | { kind: "tag"; name: string }
    | { kind: "not"; operand: TagExpression }
    | { kind: "and"; left: TagExpression; right: TagExpression }
    | { kind: "or"; left: TagExpression; right: TagExpression };

type Token = { kind: "(" | ")" | "and" | "or" | "not" } | { kind: "tag"; name: string };

const TAG_REGEX = /^@[^\s()@]+$/;

const MAX_CACHED_EXPRESSIONS = 100;

const cachedExpressions = new Map<string, TagExpression>();

function tokenize(source: string): Token[] {
    const tokens: Token[] = [];
    const words = source.replace(/([()])/g, " $1 ").split(/\s+/).filter((word) => word.length > 0);

    for (const word of words) {
        const lower = word.toLowerCase();
        if (word === "(" || word === ")") {
            tokens.push({ kind: word });
        } else if (lower === "and" || lower === "or" || lower === "not") {
            tokens.push({ kind: lower });
        } else if (TAG_REGEX.test(word)) {
            tokens.push({ kind: "tag", name: word });
        } else {
            throw new TagExpressionError(source, `unexpected "${word}"`);
        }
    }

    return tokens;
}

/**
 * Recursive descent over `or` > `and` > `not` > operand, so
 * `@a or @b and not @c` reads as `@a or (@b and (not @c))`.
 */
class TagExpressionParser {
    private position = 0;

    constructor(private readonly source: string, private readonly tokens: Token[]) { }

    parse(): TagExpression {
        if (this.tokens.length === 0) {
            return { kind: "any" };
        }

        const expression = this.parseOr();
        const trailing = this.tokens[this.position];
        if (trailing) {
            throw new TagExpressionError(this.source, `unexpected ${this.describe(trailing)}`);
        }
        return expression;
    }

    private parseOr(): TagExpression {
        let left = this.parseAnd();
        while (this.accept("or")) {
            left = { kind: "or", left, right: this.parseAnd() };
        }
        return left;
    }

    private parseAnd(): TagExpression {
        let left = this.parseNot();
        while (this.accept("and")) {
            left = { kind: "and", left, right: this.parseNot() };
        }
        return left;
    }

    private parseNot(): TagExpression {
        if (this.accept("not")) {
            return { kind: "not", operand: this.parseNot() };
        }
        return this.parseOperand();
    }

    private parseOperand(): TagExpression {
        const token = this.tokens[this.position];
        if (!token) {
            throw new TagExpressionError(this.source, "expression ends unexpectedly");
        }
        this.position++;

        if (token.kind === "tag") {
            return { kind: "tag", name: token.name };
        }
        if (token.kind === "(") {
            const inner = this.parseOr();
            if (!this.accept(")")) {
                throw new TagExpressionError(this.source, "missing closing parenthesis");
            }
            return inner;
        }
        throw new TagExpressionError(this.source, `unexpected ${this.describe(token)}`);
    }

    private accept(kind: Token["kind"]): boolean {
        if (this.tokens[this.position]?.kind === kind) {
            this.position++;
            return true;
        }
        return false;
    }

    private describe(token: Token): string {
        return token.kind === "tag" ? `tag "${token.name}"` : `"${token.kind}"`;
    }
}

export function parseTagExpression(source: string): TagExpression {
    let expression = cachedExpressions.get(source);
    if (!expression) {
        expression = new TagExpressionParser(source, tokenize(source)).parse();
        if (cachedExpressions.size >= MAX_CACHED_EXPRESSIONS) {
            cachedExpressions.clear();
        }
        cachedExpressions.set(source, expression);
    }
    return expression;
}

export function evaluateTagExpression(expression: TagExpression, tags: ReadonlyArray<string>): boolean {
    switch (expression.kind) {
        case "any":
            return true;
        case "tag":
            return tags.includes(expression.name);
        case "not":
            return !evaluateTagExpression(expression.operand, tags);
        case "and":
            return evaluateTagExpression(expression.left, tags) && evaluateTagExpression(expression.right, tags);
        case "or":
            return evaluateTagExpression(expression.left, tags) || evaluateTagExpression(expression.right, tags);
    }
}

export function formatTagExpression(expression: TagExpression): string {
    switch (expression.kind) {
        case "any":
            return "";
        case "tag":
            return expression.name;
        case "not":
            return `not ${formatOperand(expression.operand)}`;
        case "and":
        case "or":
            return `${formatOperand(expression.left)} ${expression.kind} ${formatOperand(expression.right)}`;
    }
}

function formatOperand(expression: TagExpression): string {
    return expression.kind === "and" || expression.kind === "or"
        ? `(${formatTagExpression(expression)})`
        : formatTagExpression(expression);
}
