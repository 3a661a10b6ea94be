import { RunOptions } from "./RunOptions";

export type AppEnv = {
    featuresPattern: string;
    tagExpression: string;
    maxFeatureSizeMb: number;
    quiet: boolean;
};

/** Command-line values as yargs hands them over; absent flags are undefined. */
export type CliArgs = {
    pattern?: string;
    tags?: string;
    junitOut?: string;
    out?: string;
    format?: string;
    withBackground?: boolean;
};

export interface IConfigService {
    loadEnvironment(): AppEnv;
    loadArgs(argv: CliArgs, env: AppEnv): RunOptions;
}
