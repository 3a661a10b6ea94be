export type ViolationKind =
    | "empty-steps"
    | "missing-examples"
    | "missing-column"
    | "missing-value"
    | "duplicate-column"
    | "duplicate-tag"
    | "duplicate-scenario-name"
    | "unused-column";

/**
 * Where a violation was found. Indices are zero-based; `scenario` counts the
 * feature's scenario definitions in declaration order and is absent for the
 * feature itself and its background.
 */
export interface ViolationLocation {
    feature: string;
    background?: boolean;
    scenario?: number;
    step?: number;
    examples?: number;
    row?: number;
}

export interface Violation {
    kind: ViolationKind;
    message: string;
    location: ViolationLocation;
}
