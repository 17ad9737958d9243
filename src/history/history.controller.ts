import { Controller, Get, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { HistoryPageDto, HistoryQueryDto } from './dto';
import { HistoryService } from './history.service';

@ApiTags('history')
@Controller('history')
export class HistoryController {
  constructor(private readonly historyService: HistoryService) {}

  @Get()
  @ApiOperation({ summary: 'Filtered upload history with per-status totals' })
  @ApiResponse({ status: 200, type: HistoryPageDto })
  @ApiResponse({ status: 400, description: 'Invalid filter' })
  list(@Query() query: HistoryQueryDto): Promise<HistoryPageDto> {
    return this.historyService.query(query);
  }
}
