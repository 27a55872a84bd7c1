import { Module } from '@nestjs/common';
import { ExpressionModule } from '../expression/expression.module';
import { ConversationLogModule } from '../conversation-log/conversation-log.module';
import { clockProvider } from '../../utils/clock';
import { IntentDispatcherService } from './intent-dispatcher.service';

@Module({
    imports: [ExpressionModule, ConversationLogModule],
    providers: [IntentDispatcherService, clockProvider],
    exports: [IntentDispatcherService],
})
export class IntentModule {}
