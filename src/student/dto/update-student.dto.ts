import { PartialType } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { ArrayNotEmpty, IsArray, IsBoolean, IsInt, IsOptional, ValidateNested } from 'class-validator';
import { CreateStudentDto } from './create-student.dto';

export interface UpdateStudentInput {
  firstName?: string;
  lastName?: string;
  dateOfBirth?: string | null;
  email?: string | null;
  phone?: string | null;
  gender?: string | null;
  isActive?: boolean;
}

export class UpdateStudentDto extends PartialType(CreateStudentDto) implements UpdateStudentInput {
  @IsBoolean()
  @IsOptional()
  isActive?: boolean;
}

export class BatchUpdateStudentsDto {
  @IsArray()
  @ArrayNotEmpty()
  @IsInt({ each: true })
  ids!: number[];

  @ValidateNested()
  @Type(() => UpdateStudentDto)
  changes!: UpdateStudentDto;
}

export class SetStudentActiveDto {
  @IsBoolean()
  isActive!: boolean;
}
