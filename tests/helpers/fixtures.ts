import * as fs from 'fs';
import * as path from 'path';
import { GherkinFeatureParser } from '../../src/GherkinFeatureParser';
import { Feature } from '../../src/interfaces/IFeature';
import { ILogger } from '../../src/interfaces/ILogger';

export const FEATURES_DIR = path.resolve(__dirname, '../../features');

export function readFixture(name: string): string {
    return fs.readFileSync(path.join(FEATURES_DIR, name), 'utf-8');
}

export function loadFixture(name: string): Feature {
    return new GherkinFeatureParser().parse(readFixture(name), `features/${name}`);
}

export type CapturingLogger = ILogger & { lines: string[] };

export function capturingLogger(): CapturingLogger {
    const lines: string[] = [];
    return {
        lines,
        log: (message: string) => lines.push(`[LOG] ${message}`),
        warn: (message: string) => lines.push(`[WARN] ${message}`),
        error: (message: string) => lines.push(`[ERROR] ${message}`),
    };
}
