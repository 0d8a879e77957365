import { promptBundledRead } from "../../prompts/promptBundledRead.js";

let templatePromise: Promise<string> | null = null;

/**
 * Renders the classification prompt with the user message embedded.
 */
export async function intentPromptBuild(message: string): Promise<string> {
    if (!templatePromise) {
        templatePromise = promptBundledRead("INTENT_CLASSIFY.md").catch((error: unknown) => {
            templatePromise = null;
            throw error;
        });
    }
    const template = await templatePromise;
    return template.replace("{{message}}", () => message);
}
