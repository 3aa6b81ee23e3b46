import { IsInt, IsNumber, IsOptional, IsPositive, IsString, MaxLength, Min } from 'class-validator';

export interface RecordPaymentInput {
  studentId: number;
  amount: number;
  mode?: string | null;
  referenceNo?: string | null;
}

export class RecordPaymentDto implements RecordPaymentInput {
  @IsInt()
  @IsPositive()
  studentId!: number;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  amount!: number;

  @IsString()
  @MaxLength(50)
  @IsOptional()
  mode?: string;

  @IsString()
  @MaxLength(100)
  @IsOptional()
  referenceNo?: string;
}
