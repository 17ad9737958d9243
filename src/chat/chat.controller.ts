import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ChatService } from './chat.service';
import { ChatMessageDto, ChatReplyDto, SendMessageDto } from './dto';

@ApiTags('chat')
@Controller()
export class ChatController {
  constructor(private readonly chatService: ChatService) {}

  @Post('send_message')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Relay a message to the chat webhook and wait for the reply',
  })
  @ApiResponse({ status: 200, type: ChatReplyDto })
  @ApiResponse({ status: 400, description: 'Empty or invalid message' })
  @ApiResponse({ status: 502, description: 'Chat webhook unavailable' })
  async sendMessage(@Body() dto: SendMessageDto): Promise<ChatReplyDto> {
    const response = await this.chatService.send(dto.message);
    return { response };
  }

  @Get('chat/history')
  @ApiOperation({ summary: 'All chat exchanges in the order they were sent' })
  @ApiResponse({ status: 200, type: [ChatMessageDto] })
  history(): Promise<ChatMessageDto[]> {
    return this.chatService.history();
  }
}
