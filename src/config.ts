import * as path from "path";
import * as fs from "fs";
import * as dotenv from "dotenv";
import { AppEnv, CliArgs, IConfigService } from "./interfaces/IConfigService";
import { ExportFormat } from "./interfaces/IScenarioExporter";
import { RunOptions } from "./interfaces/RunOptions";

const DEFAULT_FEATURES_PATTERN = "features/**/*.feature";
const DEFAULT_MAX_FEATURE_SIZE_MB = 50;

export class ConfigService implements IConfigService {
  loadEnvironment(): AppEnv {
    // Optional local .env (gitignored) so CI and developers can pin defaults.
    const envPath = process.env.GHERKIN_MODEL_ENV || path.resolve(".env");
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath });
    }

    const featuresPattern = process.env.GHERKIN_FEATURES || DEFAULT_FEATURES_PATTERN;
    const tagExpression = process.env.GHERKIN_TAGS || "";
    const maxFeatureSizeMb = this.parsePositiveNumber(
      "GHERKIN_MAX_FEATURE_SIZE_MB",
      process.env.GHERKIN_MAX_FEATURE_SIZE_MB,
      DEFAULT_MAX_FEATURE_SIZE_MB
    );
    const quiet = this.parseBoolean(process.env.GHERKIN_QUIET, false);

    return { featuresPattern, tagExpression, maxFeatureSizeMb, quiet };
  }

  loadArgs(argv: CliArgs, env: AppEnv): RunOptions {
    return {
      pattern: argv.pattern || env.featuresPattern,
      tagExpression: argv.tags ?? env.tagExpression,
      junitOut: argv.junitOut ? path.resolve(argv.junitOut) : undefined,
      outFile: argv.out ? path.resolve(argv.out) : undefined,
      format: this.parseFormat(argv.format, argv.out),
      withBackground: argv.withBackground ?? false,
    };
  }

  // Without --format an .xlsx output file selects xlsx; anything else is CSV.
  private parseFormat(format: string | undefined, outFile: string | undefined): ExportFormat {
    if (format === undefined) {
      return outFile && path.extname(outFile).toLowerCase() === ".xlsx" ? "xlsx" : "csv";
    }
    const value = format.toLowerCase();
    if (value !== "csv" && value !== "xlsx") {
      throw new Error(`Unsupported export format "${format}". Use csv or xlsx.`);
    }
    return value;
  }

  private parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
    if (value === undefined) return defaultValue;
    return value.toLowerCase() === "true";
  }

  private parsePositiveNumber(name: string, value: string | undefined, defaultValue: number): number {
    if (value === undefined || value === "") return defaultValue;
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new Error(`${name} must be a positive number, got "${value}".`);
    }
    return parsed;
  }
}
