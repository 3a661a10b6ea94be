import * as messages from "@cucumber/messages";
import { Feature } from "./IFeature";

export interface IFeatureParser {
    parse(text: string, uri?: string): Feature;
    fromDocument(document: messages.GherkinDocument, uri?: string): Feature;
}
