const CLI_KEYWORDS = [
    "查看代码",
    "view code",
    "分析代码",
    "analyze code",
    "代码库",
    "codebase",
    "修改文件",
    "modify file",
    "读取文件",
    "read file",
    "写入文件",
    "write file",
    "创建文件",
    "create file",
    "执行命令",
    "execute command",
    "运行脚本",
    "run script",
    "分析项目",
    "analyze project",
    "项目结构",
    "project structure"
];

/**
 * Reports whether the message mentions a task that needs local code or file access.
 */
export function cliKeywordsDetect(message: string): boolean {
    return cliKeywordFind(message) !== null;
}

/**
 * Returns the first CLI keyword found in the message, matched case-insensitively.
 */
export function cliKeywordFind(message: string): string | null {
    const lowered = message.toLowerCase();
    return CLI_KEYWORDS.find((keyword) => lowered.includes(keyword)) ?? null;
}
