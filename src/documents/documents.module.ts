import { HttpModule } from '@nestjs/axios';
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import type { AppConfig } from '../config/configuration';
import { StoreModule } from '../store/store.module';
import { DocumentsController } from './documents.controller';
import { DocumentsService } from './documents.service';
import { UploadService } from './upload.service';
import { WebhookDispatcherService } from './webhook-dispatcher.service';

@Module({
  imports: [
    HttpModule,
    StoreModule,
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) => ({
        // Per-part cap; the combined limit is checked by UploadService
        limits: {
          fileSize: configService.get('upload', { infer: true }).maxBytes,
        },
      }),
    }),
  ],
  controllers: [DocumentsController],
  providers: [UploadService, DocumentsService, WebhookDispatcherService],
  exports: [WebhookDispatcherService],
})
export class DocumentsModule {}
