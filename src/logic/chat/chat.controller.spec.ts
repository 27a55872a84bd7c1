import { Test, TestingModule } from '@nestjs/testing';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';

describe('ChatController', () => {
  let controller: ChatController;
  const chatService = {
    reply: jest.fn(),
    getHistory: jest.fn(),
  };

  beforeEach(async () => {
    jest.resetAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      controllers: [ChatController],
      providers: [{ provide: ChatService, useValue: chatService }],
    }).compile();

    controller = module.get<ChatController>(ChatController);
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  it('wraps the reply in a response envelope', async () => {
    chatService.reply.mockResolvedValue('The result is 4.');
    await expect(controller.chat({ message: '2+2' })).resolves.toEqual({ response: 'The result is 4.' });
    expect(chatService.reply).toHaveBeenCalledWith('2+2');
  });

  it('passes the history limit through', async () => {
    const turns = [{ id: 1, timestamp: '2024-01-01T00:00:00.000Z', userText: 'hi', aiText: 'hello' }];
    chatService.getHistory.mockResolvedValue({ turns, total: 1 });
    await expect(controller.getHistory({ limit: 5 })).resolves.toEqual({ turns, total: 1 });
    expect(chatService.getHistory).toHaveBeenCalledWith(5);
  });
});
