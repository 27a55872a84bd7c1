import { Inject, Injectable, Logger } from '@nestjs/common';
import { IntentDispatcherService } from '../intent/intent-dispatcher.service';
import { EMPTY_MESSAGE_REPLY } from '../intent/replies';
import { CONVERSATION_STORE, ConversationStore, DEFAULT_HISTORY_PAGE, HistoryPage } from '../conversation-log/types';

@Injectable()
export class ChatService {

    private readonly logger = new Logger(ChatService.name);

    constructor(
        private readonly intentDispatcher: IntentDispatcherService,
        @Inject(CONVERSATION_STORE)
        private readonly store: ConversationStore,
    ) { }

    /**
     * Produces the reply for one message. Never throws for any input and never
     * writes to the log; recording the turn is up to the caller.
     */
    async generateResponse(text: string): Promise<string> {
        const { response } = await this.intentDispatcher.dispatch(text);
        return response;
    }

    /**
     * Answers a message and then appends the turn to the conversation log.
     * A failed append is logged; the reply is returned regardless.
     */
    async reply(message: string | undefined): Promise<string> {
        const userText = (message ?? '').trim();
        if (!userText) {
            return EMPTY_MESSAGE_REPLY;
        }

        const response = await this.generateResponse(userText);
        try {
            await this.store.append(userText, response);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            this.logger.error(`Failed to record conversation turn: ${reason}`);
        }
        return response;
    }

    getHistory(limit = DEFAULT_HISTORY_PAGE): Promise<HistoryPage> {
        return this.store.history(limit);
    }
}
