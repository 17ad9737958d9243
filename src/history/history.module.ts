import { Module } from '@nestjs/common';
import { StoreModule } from '../store/store.module';
import { HistoryController } from './history.controller';
import { HistoryService } from './history.service';

@Module({
  imports: [StoreModule],
  controllers: [HistoryController],
  providers: [HistoryService],
})
export class HistoryModule {}
