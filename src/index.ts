#!/usr/bin/env node
import yargsFactory from "yargs/yargs";
import { hideBin } from "yargs/helpers";
import { ConfigService } from "./config";
import { ConsoleLogger } from "./ConsoleLogger";
import { App, formatTestCase } from "./App";
import { FeatureFileLoader } from "./FeatureFileLoader";
import { GherkinFeatureParser } from "./GherkinFeatureParser";
import { GherkinStepConverter } from "./GherkinStepConverter";
import { JUnitLintReporter } from "./JUnitLintReporter";
import { ScenarioExporter } from "./ScenarioExporter";
import { CliArgs } from "./interfaces/IConfigService";

type Command = "lint" | "list" | "export";

async function run(command: Command, argv: CliArgs): Promise<number> {
  const configService = new ConfigService();
  const env = configService.loadEnvironment();
  const options = configService.loadArgs(argv, env);

  const logger = new ConsoleLogger(env.quiet);
  const loader = new FeatureFileLoader(new GherkinFeatureParser(), logger, {
    maxFeatureSizeMb: env.maxFeatureSizeMb,
  });
  const exporter = new ScenarioExporter(new GherkinStepConverter(), logger);
  const app = new App(loader, new JUnitLintReporter(), exporter, logger);

  switch (command) {
    case "lint":
      return (await app.lint(options)) ? 0 : 1;
    case "list": {
      const testCases = await app.list(options);
      for (const testCase of testCases) {
        console.log(formatTestCase(testCase, options.withBackground));
      }
      return 0;
    }
    case "export":
      await app.export(options);
      return 0;
  }
}

async function main(): Promise<number> {
  const patternArg = {
    type: "string",
    describe: "Glob of feature files (default: GHERKIN_FEATURES or features/**/*.feature)",
  } as const;
  const tagsOption = {
    type: "string",
    describe: 'Tag expression, e.g. "@smoke and not @regression"',
  } as const;

  const argv = yargsFactory(hideBin(process.argv))
    .scriptName("gherkin-model")
    .command("lint [pattern]", "Validate feature files and report every violation", (y) =>
      y.positional("pattern", patternArg).option("junit-out", {
        type: "string",
        describe: "Also write the results as JUnit XML",
      })
    )
    .command("list [pattern]", "List the concrete scenarios a harness would run", (y) =>
      y.positional("pattern", patternArg).option("tags", tagsOption).option("with-background", {
        type: "boolean",
        default: false,
        describe: "Print each scenario's steps, background first",
      })
    )
    .command("export [pattern]", "Export scenarios as manual test steps", (y) =>
      y
        .positional("pattern", patternArg)
        .option("tags", tagsOption)
        .option("out", { type: "string", demandOption: true, describe: "Output file" })
        .option("format", { choices: ["csv", "xlsx"] as const, describe: "Defaults to the output file's extension" })
    )
    .demandCommand(1, "Choose a command: lint, list or export")
    .strict()
    .parseSync();

  const command = String(argv._[0]);
  if (command !== "lint" && command !== "list" && command !== "export") {
    throw new Error(`Unknown command "${command}"`);
  }

  const cliArgs: CliArgs = {
    pattern: typeof argv.pattern === "string" ? argv.pattern : undefined,
    tags: typeof argv.tags === "string" ? argv.tags : undefined,
    junitOut: typeof argv["junit-out"] === "string" ? argv["junit-out"] : undefined,
    out: typeof argv.out === "string" ? argv.out : undefined,
    format: typeof argv.format === "string" ? argv.format : undefined,
    withBackground: argv["with-background"] === true,
  };

  return run(command, cliArgs);
}

main()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((err: unknown) => {
    // Failures are reported even when GHERKIN_QUIET silences progress.
    new ConsoleLogger().error("💥 Error during execution:", err);
    process.exit(1);
  });
