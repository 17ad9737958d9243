import { HttpService } from '@nestjs/axios';
import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import type { AppConfig } from '../config/configuration';
import { ChatDispatchException, errorMessage } from '../common/errors';
import { ChatMessage } from '../store/entities/chat-message.entity';
import { JobStoreService } from '../store/job-store.service';

export const CHAT_FALLBACK_REPLY =
  "Sorry, I couldn't process your message at the moment.";

@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);
  private readonly webhookUrl: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly httpService: HttpService,
    private readonly jobStore: JobStoreService,
    configService: ConfigService<AppConfig, true>,
  ) {
    const webhooks = configService.get('webhooks', { infer: true });
    this.webhookUrl = webhooks.chatUrl;
    this.timeoutMs = webhooks.chatTimeoutMs;
  }

  /**
   * Records the message, waits for the chat webhook and stores its reply.
   * On any webhook failure the row gets the fallback reply and the caller a 502.
   */
  async send(message: string): Promise<string> {
    const text = message.trim();
    if (!text) {
      throw new BadRequestException('Message cannot be empty');
    }

    const chatId = await this.jobStore.createChat(text);

    let reply: string;
    try {
      reply = await this.requestReply(text);
    } catch (error) {
      this.logger.warn(
        `Chat webhook failed for message ${chatId}: ${errorMessage(error)}`,
      );
      await this.jobStore.fillChatResponse(chatId, CHAT_FALLBACK_REPLY);
      throw new ChatDispatchException(CHAT_FALLBACK_REPLY);
    }

    await this.jobStore.fillChatResponse(chatId, reply);
    return reply;
  }

  history(): Promise<ChatMessage[]> {
    return this.jobStore.listChats();
  }

  private async requestReply(message: string): Promise<string> {
    const response = await firstValueFrom(
      this.httpService.post<string>(
        this.webhookUrl,
        { message },
        {
          responseType: 'text',
          timeout: this.timeoutMs,
          validateStatus: () => true,
        },
      ),
    );

    if (response.status < 200 || response.status >= 300) {
      throw new Error(`Chat webhook responded with HTTP ${response.status}`);
    }
    const reply: unknown = response.data;
    if (typeof reply !== 'string' || !reply.trim()) {
      throw new Error('Chat webhook returned an empty reply');
    }
    return reply;
  }
}
