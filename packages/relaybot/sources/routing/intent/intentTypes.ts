export type IntentClassification = {
    needsCli: boolean;
    /** 0..1 */
    confidence: number;
    reason: string;
    category: string;
};

/**
 * One step of classification; null means no opinion and the next strategy runs.
 */
export type IntentStrategy = {
    name: string;
    classify(message: string): Promise<IntentClassification | null>;
};
