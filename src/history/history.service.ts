import { BadRequestException, Injectable } from '@nestjs/common';
import { JobFilter, JobStoreService } from '../store/job-store.service';
import { HistoryPageDto, HistoryQueryDto } from './dto';

@Injectable()
export class HistoryService {
  constructor(private readonly jobStore: JobStoreService) {}

  async query(query: HistoryQueryDto): Promise<HistoryPageDto> {
    const filter: JobFilter = {
      status: query.status,
      filenameContains: query.filename?.trim() || undefined,
      from: query.from ? new Date(query.from) : undefined,
      to: query.to ? new Date(query.to) : undefined,
      sort: query.sort,
      order: query.order === 'asc' ? 'ASC' : 'DESC',
      limit: query.limit,
      offset: query.offset,
    };
    for (const [name, date] of [
      ['from', filter.from],
      ['to', filter.to],
    ] as const) {
      if (date && Number.isNaN(date.getTime())) {
        throw new BadRequestException(`"${name}" is not a supported date`);
      }
    }
    if (filter.from && filter.to && filter.from > filter.to) {
      throw new BadRequestException('"from" must not be later than "to"');
    }

    const [{ jobs, total }, counts] = await Promise.all([
      this.jobStore.listJobs(filter),
      this.jobStore.countJobsByStatus(filter),
    ]);
    return { jobs, total, counts };
  }
}
