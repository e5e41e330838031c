import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { CreateRecordDto } from './dtos/create-record.dto';
import { ListRecordsQueryDto } from './dtos/list-records-query.dto';
import { unwrapOrThrow } from './errors/record-store.exception';
import { RecordStoreService } from './record-store.service';
import { SoftDeleteRecord } from './soft-delete-record';
import { resolveListQueryMode, resolveQueryMode } from './visibility/query-mode.resolver';

function parseOptionalInt(raw: string | undefined): number | undefined {
  return raw === undefined ? undefined : Number(raw);
}

@Controller('records')
export class RecordsController {
  constructor(private readonly recordStore: RecordStoreService) {}

  @Post()
  async create(@Body() dto: CreateRecordDto): Promise<SoftDeleteRecord> {
    return unwrapOrThrow(await this.recordStore.create(dto.payload));
  }

  // ?showDeleted=true includes soft-deleted records, ?onlyDeleted=true lists the trash
  @Get()
  async list(@Query() query: ListRecordsQueryDto): Promise<SoftDeleteRecord[]> {
    const mode = resolveListQueryMode(query);
    const sequence = unwrapOrThrow(
      this.recordStore.list(mode, {
        order: query.order,
        offset: parseOptionalInt(query.offset),
        limit: parseOptionalInt(query.limit),
      }),
    );
    return unwrapOrThrow(await sequence.collect());
  }

  @Get(':id')
  async findOne(
    @Param('id') id: string,
    @Query('showDeleted') showDeleted?: string,
  ): Promise<SoftDeleteRecord> {
    return unwrapOrThrow(await this.recordStore.get(id, resolveQueryMode(showDeleted)));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async softDelete(@Param('id') id: string): Promise<void> {
    unwrapOrThrow(await this.recordStore.softDelete(id));
  }

  @Post(':id/restore')
  @HttpCode(HttpStatus.OK)
  async restore(@Param('id') id: string): Promise<SoftDeleteRecord> {
    return unwrapOrThrow(await this.recordStore.restore(id));
  }

  @Delete(':id/permanent')
  @HttpCode(HttpStatus.NO_CONTENT)
  async hardDelete(@Param('id') id: string): Promise<void> {
    unwrapOrThrow(await this.recordStore.hardDelete(id));
  }
}
