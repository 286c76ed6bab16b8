import { Controller, Get, NotFoundException, Param, Query, ValidationPipe } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { ErrorLog } from './error-log';
import { ErrorLogEntry, ErrorSummary } from './error-record';
import { ListErrorsDto } from './dto/list-errors.dto';

export const DEFAULT_PAGE_SIZE = 15;

@ApiTags('errors')
@Controller('errors')
export class ErrorsController {
  constructor(private readonly errors: ErrorLog) {}

  @Get()
  async list(@Query(new ValidationPipe({ transform: true })) q: ListErrorsDto) {
    const page = q.page ?? 0;
    const size = q.size ?? DEFAULT_PAGE_SIZE;
    const items: ErrorLogEntry<ErrorSummary>[] = [];
    const total = await this.errors.getErrors(page, size, items);
    return { items, total, page, size };
  }

  @Get(':id')
  async get(@Param('id') id: string) {
    const entry = await this.errors.getError(id);
    if (!entry) throw new NotFoundException('Error not found');
    return entry;
  }
}
