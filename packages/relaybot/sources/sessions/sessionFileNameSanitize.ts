const FILE_NAME_MAX_LENGTH = 100;

/**
 * Strips characters that are illegal in file names on common platforms.
 * Removes `< > : " / \ | ? *` and control characters, caps the length, and never returns an empty name.
 */
export function sessionFileNameSanitize(value: string): string {
    // biome-ignore lint/suspicious/noControlCharactersInRegex: matches control characters
    const stripped = value.replace(/[<>:"/\\|?*\u0000-\u001f\u007f]/g, "").slice(0, FILE_NAME_MAX_LENGTH);
    return stripped.length > 0 ? stripped : "unknown";
}
