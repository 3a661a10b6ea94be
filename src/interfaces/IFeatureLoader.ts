import { Feature } from "./IFeature";
import { FeatureParseError } from "../errors";

export type FeatureLoadResult =
    | { ok: true; uri: string; feature: Feature }
    | { ok: false; uri: string; error: FeatureParseError };

export interface IFeatureLoader {
    load(pattern: string): Promise<FeatureLoadResult[]>;
}
