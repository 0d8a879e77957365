const LANGUAGE_NAMES: Record<string, string> = {
    "zh-CN": "中文（简体）",
    "zh-TW": "中文（繁體）",
    "en-US": "English",
    "en-GB": "English (UK)",
    "ja-JP": "日本語",
    "ko-KR": "한국어",
    "fr-FR": "Français",
    "de-DE": "Deutsch",
    "es-ES": "Español",
    "ru-RU": "Русский",
    "pt-BR": "Português (Brasil)",
    "it-IT": "Italiano",
    "ar-SA": "العربية",
    "hi-IN": "हिन्दी"
};

/**
 * Returns the response-language instruction, or "" when no language is configured.
 * Unknown codes are used verbatim as the language name.
 */
export function languageInstruction(languageCode: string | null): string {
    const code = languageCode?.trim();
    if (!code) {
        return "";
    }
    return `Please respond in ${LANGUAGE_NAMES[code] ?? code}.`;
}

export function languageInstructionPrepend(message: string, languageCode: string | null): string {
    const instruction = languageInstruction(languageCode);
    return instruction ? `${instruction}\n\n${message}` : message;
}
