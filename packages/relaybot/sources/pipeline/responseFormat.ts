/**
 * Renders executor output, labelled with the executor's display name when known.
 */
export function responseFormat(output: string, executorName?: string | null): string {
    return executorName ? `${executorLabel(executorName)}${output}` : output;
}

export function responseErrorFormat(error: string, executorName?: string | null): string {
    const body = `❌ 处理失败 / Error\n\n${error}`;
    return executorName ? `${executorLabel(executorName)}${body}` : body;
}

function executorLabel(executorName: string): string {
    return `【使用 ${executorName} 回答】\n\n`;
}
