import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ChatModule } from './chat/chat.module';
import configuration, { AppConfig } from './config/configuration';
import { DocumentsModule } from './documents/documents.module';
import { HealthController } from './health/health.controller';
import { HistoryModule } from './history/history.module';
import { LoggerModule } from './logs/logger.module';
import { databaseOptions } from './store/database.config';
import { StoreModule } from './store/store.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [configuration],
    }),

    // Database (TypeORM + better-sqlite3)
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) =>
        databaseOptions(configService.get('database', { infer: true })),
    }),

    // Feature Modules
    LoggerModule,
    StoreModule,
    DocumentsModule,
    ChatModule,
    HistoryModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}
