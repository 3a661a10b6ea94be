import { IGherkinStepConverter, ManualTestStep } from "./interfaces/IGherkinStepConverter";
import { Step } from "./interfaces/IFeature";

function renderStep(step: Step): string {
    const line = `${step.keyword} ${step.text}`;
    if (step.argument?.kind === "dataTable") {
        const rows = step.argument.rows.map((row) => `| ${row.join(" | ")} |`);
        return [line, ...rows].join("\n");
    }
    if (step.argument?.kind === "docString") {
        return `${line}\n${step.argument.content}`;
    }
    return line;
}

/**
 * Folds Gherkin steps into action/expected pairs: Given and When open a new
 * action, Then fills the current action's expected result, and And, But and *
 * extend whichever side was written last.
 */
export class GherkinStepConverter implements IGherkinStepConverter {
    public convert(gherkinSteps: ReadonlyArray<Step>): ManualTestStep[] {
        const manualSteps: ManualTestStep[] = [];
        let currentStep: ManualTestStep | null = null;

        for (const step of gherkinSteps) {
            const text = renderStep(step);

            if (step.keyword === "Then") {
                if (currentStep) {
                    currentStep.expected = currentStep.expected ? `${currentStep.expected}\n${text}` : text;
                } else {
                    currentStep = { action: "Check Condition", expected: text };
                    manualSteps.push(currentStep);
                }
            } else if (step.keyword === "And" || step.keyword === "But" || step.keyword === "*") {
                if (!currentStep) {
                    currentStep = { action: text, expected: "" };
                    manualSteps.push(currentStep);
                } else if (currentStep.expected) {
                    currentStep.expected += `\n${text}`;
                } else {
                    currentStep.action += `\n${text}`;
                }
            } else {
                currentStep = { action: text, expected: "" };
                manualSteps.push(currentStep);
            }
        }

        return manualSteps;
    }
}
