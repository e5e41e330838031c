import { IsEnum, IsNumberString, IsOptional } from 'class-validator';
import { SortOrder } from 'src/shared/enums';

export class ListRecordsQueryDto {
  // Visibility flags stay unvalidated: unrecognised values resolve to active-only
  @IsOptional()
  showDeleted?: string;

  @IsOptional()
  onlyDeleted?: string;

  @IsOptional()
  @IsEnum(SortOrder)
  order?: SortOrder;

  @IsOptional()
  @IsNumberString()
  offset?: string;

  @IsOptional()
  @IsNumberString()
  limit?: string;
}
