import { ILogger } from "./interfaces/ILogger";

function describeError(error: unknown): string {
    if (typeof error === "string") return error;
    if (error instanceof Error) return error.message;
    return JSON.stringify(error);
}

export class ConsoleLogger implements ILogger {
    constructor(private readonly quiet: boolean = false) { }

    log(message: string): void {
        if (!this.quiet) {
            console.log(message);
        }
    }

    warn(message: string, error?: unknown): void {
        if (error !== undefined) {
            console.warn(`⚠️ ${message}`, describeError(error));
        } else {
            console.warn(`⚠️ ${message}`);
        }
    }

    error(message: string, error?: unknown): void {
        if (error !== undefined) {
            console.error(`❌ ${message}`, describeError(error));
        } else {
            console.error(`❌ ${message}`);
        }
    }
}
