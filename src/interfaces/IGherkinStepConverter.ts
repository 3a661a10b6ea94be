import { Step } from "./IFeature";

/** One row of a manual test case: what to do and what should happen. */
export interface ManualTestStep {
    action: string;
    expected: string;
}

export interface IGherkinStepConverter {
    convert(gherkinSteps: ReadonlyArray<Step>): ManualTestStep[];
}
