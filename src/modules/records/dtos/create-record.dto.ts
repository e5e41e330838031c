import { IsObject } from 'class-validator';
import { RecordPayload } from '../soft-delete-record';

export class CreateRecordDto {
  @IsObject()
  payload!: RecordPayload;
}
