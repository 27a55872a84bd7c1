import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { ChatService } from './chat.service';
import { ChatRequestDto, ChatResponse, HistoryQueryDto } from './dto/chat.dto';

@Controller('chat')
export class ChatController {

    constructor(private readonly chatService: ChatService) {}

    @Post()
    @HttpCode(HttpStatus.OK)
    async chat(@Body() body: ChatRequestDto): Promise<ChatResponse> {
        return { response: await this.chatService.reply(body.message) };
    }

    @Get('history')
    getHistory(@Query() query: HistoryQueryDto) {
        return this.chatService.getHistory(query.limit);
    }
}
