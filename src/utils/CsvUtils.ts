const FORMULA_PREFIXES = ["=", "+", "@"];

/**
 * Neutralises spreadsheet formulas by prefixing a single quote when the value
 * (ignoring leading whitespace) starts with `=`, `+` or `@`, or with `-` not
 * followed by a space. `- item` bullet points are left alone.
 */
export function sanitizeForCsv(value: string): string {
    const trimmed = value.trim();
    const first = trimmed.charAt(0);

    if (FORMULA_PREFIXES.includes(first)) {
        return `'${value}`;
    }
    if (first === "-" && trimmed.charAt(1) !== " ") {
        return `'${value}`;
    }
    return value;
}

/** RFC 4180 quoting: fields with a comma, quote or line break are wrapped and quotes doubled. */
export function escapeCsvField(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function toCsvLine(values: ReadonlyArray<string>): string {
    return values.map((value) => escapeCsvField(sanitizeForCsv(value))).join(",");
}
