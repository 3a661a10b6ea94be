import * as fs from "fs";
import * as glob from "glob";
import { GherkinStreams } from "@cucumber/gherkin-streams";
import * as messages from "@cucumber/messages";
import { FeatureLoadResult, IFeatureLoader } from "./interfaces/IFeatureLoader";
import { IFeatureParser } from "./interfaces/IFeatureParser";
import { ILogger } from "./interfaces/ILogger";
import { FeatureParseError, FeatureSyntaxError } from "./errors";
import { isWithinRoot } from "./utils/PathUtils";

export type FeatureLoaderOptions = {
    maxFeatureSizeMb: number;
    root?: string;
};

export class FeatureFileLoader implements IFeatureLoader {
    constructor(
        private parser: IFeatureParser,
        private logger: ILogger,
        private options: FeatureLoaderOptions
    ) { }

    public async load(pattern: string): Promise<FeatureLoadResult[]> {
        this.logger.log(`Searching for feature files: ${pattern}`);
        const files = glob.sync(pattern, { nodir: true }).sort();

        if (files.length === 0) {
            this.logger.log("No feature files found.");
            return [];
        }

        const validFiles = files.filter((file) => this.isLoadable(file));
        if (validFiles.length === 0) {
            this.logger.log("No valid feature files found after filtering.");
            return [];
        }

        const results = await this.streamFeatures(validFiles);
        this.logger.log(`📄 Loaded ${results.filter((r) => r.ok).length} of ${results.length} feature files.`);
        return results;
    }

    // Size errors abort the run; unreadable files are skipped with a warning.
    private isLoadable(file: string): boolean {
        if (!isWithinRoot(file, this.options.root)) {
            this.logger.warn(`Skipping feature file outside the working directory: ${file}`);
            return false;
        }

        let stats: fs.Stats;
        try {
            stats = fs.statSync(file);
        } catch (err) {
            this.logger.warn(`Skipping file due to access error: ${file}`, err);
            return false;
        }
        if (!stats.isFile()) {
            return false;
        }

        const maxBytes = this.options.maxFeatureSizeMb * 1024 * 1024;
        if (stats.size > maxBytes) {
            throw new Error(
                `Feature file is too large (${(stats.size / 1024 / 1024).toFixed(2)}MB): ${file}. Max allowed: ${this.options.maxFeatureSizeMb}MB.`
            );
        }

        return true;
    }

    private streamFeatures(files: string[]): Promise<FeatureLoadResult[]> {
        const results: FeatureLoadResult[] = [];
        const stream = GherkinStreams.fromPaths(files, {
            newId: messages.IdGenerator.uuid(),
            includeSource: false,
            includeGherkinDocument: true,
            includePickles: false,
        });

        return new Promise<FeatureLoadResult[]>((resolve, reject) => {
            stream.on("data", (envelope: messages.Envelope) => {
                try {
                    if (envelope.parseError) {
                        this.recordParseError(envelope.parseError, results);
                    } else if (envelope.gherkinDocument) {
                        results.push(this.convertDocument(envelope.gherkinDocument));
                    }
                } catch (err) {
                    stream.destroy();
                    reject(err);
                }
            });
            stream.on("end", () => resolve(results));
            stream.on("error", (err) => reject(err));
        });
    }

    // A file with several syntax errors yields several envelopes; keep the first.
    private recordParseError(parseError: messages.ParseError, results: FeatureLoadResult[]): void {
        const uri = parseError.source.uri ?? "unknown";
        if (results.some((result) => result.uri === uri)) {
            return;
        }

        results.push({
            ok: false,
            uri,
            error: new FeatureSyntaxError(parseError.message.replace(/^\(\d+:\d+\): /, ""), {
                uri,
                line: parseError.source.location?.line,
                column: parseError.source.location?.column,
            }),
        });
    }

    private convertDocument(document: messages.GherkinDocument): FeatureLoadResult {
        const uri = document.uri ?? "unknown";
        try {
            return { ok: true, uri, feature: this.parser.fromDocument(document, uri) };
        } catch (err) {
            if (err instanceof FeatureParseError) {
                return { ok: false, uri, error: err };
            }
            throw err;
        }
    }
}
