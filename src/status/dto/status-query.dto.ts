import { IsEnum, IsOptional, IsString, MaxLength } from 'class-validator';
import { Transform } from 'class-transformer';
import { TransactionType } from '../../upstream/types/upstream.types';

const trim = ({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value);

export class StatusQueryDto {
  @IsOptional()
  @Transform(trim)
  @IsString({ message: 'order_id must be a string' })
  @MaxLength(100, { message: 'order_id must not exceed 100 characters' })
  order_id?: string;

  // Older callers send the id as `id`.
  @IsOptional()
  @Transform(trim)
  @IsString({ message: 'id must be a string' })
  @MaxLength(100, { message: 'id must not exceed 100 characters' })
  id?: string;

  @Transform(({ value }: { value: unknown }) =>
    typeof value === 'string' ? value.trim().toLowerCase() : value,
  )
  @IsEnum(TransactionType, { message: 'type must be payout or payin' })
  type: TransactionType = TransactionType.PAYOUT;
}
