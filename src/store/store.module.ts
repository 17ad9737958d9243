import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ChatMessage } from './entities/chat-message.entity';
import { UploadJob } from './entities/upload-job.entity';
import { JobStoreService } from './job-store.service';

@Module({
  imports: [TypeOrmModule.forFeature([UploadJob, ChatMessage])],
  providers: [JobStoreService],
  exports: [JobStoreService],
})
export class StoreModule {}
