import { languageInstructionPrepend } from "../assistant/languageInstruction.js";
import type { InboundMessage } from "../connectors/connectorTypes.js";
import type { DedupCache } from "../dedup/dedupCache.js";
import { executionFailureBuild } from "../executors/executionResultBuild.js";
import { ExecutorNotAvailableError } from "../executors/executorNotAvailableError.js";
import type { ExecutorRegistry } from "../executors/executorRegistry.js";
import type { ExecutionResult } from "../executors/executorTypes.js";
import { getLogger } from "../log.js";
import { commandParse } from "../routing/commandParse.js";
import type { ParsedCommand } from "../routing/routingTypes.js";
import type { RouteResult, SmartRouter } from "../routing/smartRouter.js";
import type { SessionManager } from "../sessions/sessionManager.js";
import { responseErrorFormat, responseFormat } from "./responseFormat.js";

const logger = getLogger("pipeline");

const PROMPT_PREVIEW_LENGTH = 200;

export type MessageReply = (chatId: string, text: string) => Promise<void>;

export type MessagePipelineOptions = {
    dedup: DedupCache;
    router: SmartRouter;
    registry: ExecutorRegistry;
    sessions: SessionManager;
    reply: MessageReply;
    responseLanguage?: string | null;
    /** Logs routing decisions and prompt previews at info level. */
    verbose?: boolean;
};

/**
 * Handles one inbound chat message end to end: dedup, prefix parsing, session commands,
 * routing, execution, reply and history recording.
 */
export class MessagePipeline {
    private readonly dedup: DedupCache;
    private readonly router: SmartRouter;
    private readonly registry: ExecutorRegistry;
    private readonly sessions: SessionManager;
    private readonly reply: MessageReply;
    private readonly responseLanguage: string | null;
    private readonly verbose: boolean;

    constructor(options: MessagePipelineOptions) {
        this.dedup = options.dedup;
        this.router = options.router;
        this.registry = options.registry;
        this.sessions = options.sessions;
        this.reply = options.reply;
        this.responseLanguage = options.responseLanguage ?? null;
        this.verbose = options.verbose ?? false;
    }

    async handle(message: InboundMessage): Promise<void> {
        if (this.dedup.isProcessed(message.messageId)) {
            return;
        }
        this.dedup.markProcessed(message.messageId);
        logger.info({ messageId: message.messageId, userId: message.userId }, "receive: Message received");

        const parsed = quotedCombine(commandParse(message.text), message.quotedText);

        // Native CLI sessions are not tracked, so /new only rotates the stored conversation.
        const sessionReply = await this.sessions.handleSessionCommand(message.userId, parsed.message);
        if (sessionReply !== null) {
            await this.reply(message.chatId, sessionReply);
            return;
        }

        let route: RouteResult;
        try {
            route = await this.router.routeResolve(parsed);
        } catch (error) {
            if (error instanceof ExecutorNotAvailableError) {
                logger.warn({ messageId: message.messageId, reason: error.reason }, "route: No executor for message");
                await this.reply(message.chatId, responseErrorFormat(error.message));
                return;
            }
            logger.error({ messageId: message.messageId, error }, "route: Routing failed");
            await this.reply(message.chatId, responseErrorFormat(`Routing failed: ${errorMessageGet(error)}`));
            return;
        }

        const executorName = this.registry.getExecutorMetadata(route.provider, route.layer)?.name ?? null;
        const prompt = languageInstructionPrepend(parsed.message, this.responseLanguage);
        if (this.verbose) {
            logger.info(
                {
                    provider: route.provider,
                    layer: route.layer,
                    fallback: route.fallback,
                    preview: prompt.slice(0, PROMPT_PREVIEW_LENGTH)
                },
                "route: Executing message"
            );
        }
        let result: ExecutionResult;
        try {
            if (route.layer === "api") {
                const history = await this.sessions.getConversationHistory(message.userId);
                result = await route.executor.execute(prompt, history);
            } else {
                result = await route.executor.execute(prompt, undefined, { userId: message.userId });
            }
        } catch (error) {
            logger.error(
                { messageId: message.messageId, executor: route.executor.providerName(), error },
                "execute: Executor threw"
            );
            result = executionFailureBuild(`AI execution failed: ${errorMessageGet(error)}`, 0);
        }

        const errorText = result.success ? null : result.errorMessage || result.stderr;
        await this.reply(
            message.chatId,
            errorText === null ? responseFormat(result.stdout, executorName) : responseErrorFormat(errorText, executorName)
        );

        await this.sessions.addMessage(message.userId, "user", parsed.message);
        await this.sessions.addMessage(message.userId, "assistant", errorText ?? result.stdout);
        logger.info(
            {
                messageId: message.messageId,
                executor: route.executor.providerName(),
                success: result.success,
                seconds: result.executionTimeSeconds
            },
            "reply: Message handled"
        );
    }
}

function errorMessageGet(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function quotedCombine(parsed: ParsedCommand, quotedText: string | null | undefined): ParsedCommand {
    if (!quotedText) {
        return parsed;
    }
    return { ...parsed, message: `Quoted message: ${quotedText}\n\nCurrent message: ${parsed.message}` };
}
