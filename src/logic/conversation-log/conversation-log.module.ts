import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Turn } from '../../entities';
import { clockProvider } from '../../utils/clock';
import { ConversationLogService } from './conversation-log.service';
import { CONVERSATION_STORE } from './types';

@Module({
    imports: [TypeOrmModule.forFeature([Turn])],
    providers: [
        ConversationLogService,
        clockProvider,
        { provide: CONVERSATION_STORE, useExisting: ConversationLogService },
    ],
    exports: [CONVERSATION_STORE, ConversationLogService],
})
export class ConversationLogModule {}
