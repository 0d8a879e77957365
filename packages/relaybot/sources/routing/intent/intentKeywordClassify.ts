import { cliKeywordFind } from "../cliKeywordsDetect.js";
import type { IntentClassification } from "./intentTypes.js";

/**
 * Classifies by keyword search alone; used when no model answer is available.
 */
export function intentKeywordClassify(message: string): IntentClassification {
    const keyword = cliKeywordFind(message);
    if (keyword) {
        return {
            needsCli: true,
            confidence: 0.7,
            reason: `Contains CLI keyword: ${keyword}`,
            category: "keyword_match"
        };
    }
    return {
        needsCli: false,
        confidence: 0.6,
        reason: "No CLI keyword detected",
        category: "default"
    };
}
