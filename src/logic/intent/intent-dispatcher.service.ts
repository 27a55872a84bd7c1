import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExpressionService } from '../expression/expression.service';
import { CONVERSATION_STORE, ConversationStore } from '../conversation-log/types';
import { CLOCK, Clock } from '../../utils/clock';
import { INTENT_RULES, matchRule, normalizeMessage } from './intent.rules';
import {
    FALLBACK_REPLY,
    SELF_DESCRIPTION_REPLY,
    arithmeticReply,
    dateReply,
    historyReply,
    timeReply,
} from './replies';
import { DispatchResult, Intent, IntentHandler } from './types';

const DEFAULT_RECALL_LIMIT = 10;

@Injectable()
export class IntentDispatcherService {

    private readonly logger = new Logger(IntentDispatcherService.name);
    private readonly handlers: Record<Intent, IntentHandler>;
    private readonly recallLimit: number;

    constructor(
        private readonly expressionService: ExpressionService,
        @Inject(CONVERSATION_STORE)
        private readonly store: ConversationStore,
        @Inject(CLOCK)
        private readonly clock: Clock,
        configService: ConfigService,
    ) {
        this.recallLimit = configService.get<number>('HISTORY_RECALL_LIMIT', DEFAULT_RECALL_LIMIT);
        this.handlers = {
            [Intent.ARITHMETIC]: async text => this.answerArithmetic(text),
            [Intent.DATE_QUERY]: async () => dateReply(this.clock()),
            [Intent.TIME_QUERY]: async () => timeReply(this.clock()),
            [Intent.HISTORY_RECALL]: () => this.answerHistory(),
            [Intent.SELF_IDENTIFY]: async () => SELF_DESCRIPTION_REPLY,
            [Intent.FALLBACK]: async () => FALLBACK_REPLY,
        };
    }

    classify(text: string): Intent {
        return matchRule(text).intent;
    }

    /**
     * Walks the rule table from the top. A handler that declines sends the
     * message on to the rules below the one that matched, so the fallback
     * rule always answers last.
     */
    async dispatch(text: string): Promise<DispatchResult> {
        const message = normalizeMessage(text);
        let startAt = 0;
        while (startAt < INTENT_RULES.length) {
            const { intent, index } = matchRule(message, startAt);
            const response = await this.handlers[intent](message);
            if (response !== null) {
                return { intent, response };
            }
            startAt = index + 1;
        }
        return { intent: Intent.FALLBACK, response: FALLBACK_REPLY };
    }

    private answerArithmetic(text: string): string | null {
        const result = this.expressionService.evaluateText(text);
        if (!result.ok) {
            this.logger.debug(`Not arithmetic after all (${result.error.kind}: ${result.error.message}), falling through`);
            return null;
        }
        return arithmeticReply(result.value);
    }

    private async answerHistory(): Promise<string | null> {
        try {
            const turns = await this.store.fetchRecent(this.recallLimit);
            return historyReply(turns);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            this.logger.error(`Could not read conversation history: ${reason}`);
            return null;
        }
    }
}
