import { Module } from '@nestjs/common';
import { ChatService } from './chat.service';
import { ChatController } from './chat.controller';
import { IntentModule } from '../intent/intent.module';
import { ConversationLogModule } from '../conversation-log/conversation-log.module';

@Module({
    imports: [
        IntentModule,
        ConversationLogModule,
    ],
    controllers: [ChatController],
    providers: [ChatService],
    exports: [ChatService],
})
export class ChatModule {}
