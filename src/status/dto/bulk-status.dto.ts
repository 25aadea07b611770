import { ArrayMaxSize, ArrayNotEmpty, IsArray, IsEnum, IsString } from 'class-validator';
import { Transform } from 'class-transformer';
import { TransactionType } from '../../upstream/types/upstream.types';
import { BULK_MAX_IDS } from '../types/status.types';

/**
 * Accepts ids as a JSON array of strings/numbers or as one comma-separated
 * string. Anything else is left for the validators to reject.
 */
function toIdList({ value }: { value: unknown }): unknown {
  if (typeof value === 'string') {
    return value.trim() === '' ? [] : value.split(',');
  }
  if (Array.isArray(value)) {
    return value.map((id: unknown) => (typeof id === 'number' ? String(id) : id));
  }
  return value;
}

function toTransactionType({ value }: { value: unknown }): unknown {
  if (value === undefined || value === null) {
    return TransactionType.PAYOUT;
  }
  if (typeof value !== 'string') {
    return value;
  }
  const type = value.trim().toLowerCase();
  return type === '' ? TransactionType.PAYOUT : type;
}

export class BulkStatusDto {
  @Transform(toTransactionType)
  @IsEnum(TransactionType, { message: 'type must be payout or payin' })
  type: TransactionType = TransactionType.PAYOUT;

  @Transform(toIdList)
  @IsArray({ message: 'ids must be a non-empty list' })
  @ArrayNotEmpty({ message: 'ids must be a non-empty list' })
  @ArrayMaxSize(BULK_MAX_IDS, {
    message: `ids must not contain more than ${BULK_MAX_IDS} entries`,
  })
  @IsString({ each: true, message: 'each id must be a string or number' })
  ids!: string[];
}
