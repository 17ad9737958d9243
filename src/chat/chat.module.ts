import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { ChatController } from './chat.controller';
import { ChatService } from './chat.service';

@Module({
  imports: [HttpModule, StoreModule],
  controllers: [ChatController],
  providers: [ChatService],
})
export class ChatModule {}
