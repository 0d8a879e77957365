export type InboundMessage = {
    /** Platform message id, used for de-duplication. */
    messageId: string;
    userId: string;
    chatId: string;
    text: string;
    /** Text of the message being replied to, when the platform provides it. */
    quotedText?: string | null;
};

export type InboundHandler = (message: InboundMessage) => void | Promise<void>;

export type InboundUnsubscribe = () => void;

export interface Connector {
    onMessage(handler: InboundHandler): InboundUnsubscribe;
    sendMessage(chatId: string, text: string): Promise<void>;
    shutdown?: (reason?: string) => void | Promise<void>;
}
