import { IsDateString, IsEmail, IsIn, IsNotEmpty, IsOptional, IsString, Length, MaxLength } from 'class-validator';
import { GENDER_CODES } from '../entities/student.entity';

export interface RegisterStudentInput {
  firstName: string;
  lastName: string;
  dateOfBirth?: string | null;
  email?: string | null;
  phone?: string | null;
  gender?: string | null;
}

export class CreateStudentDto implements RegisterStudentInput {
  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  firstName!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  lastName!: string;

  @IsDateString()
  @IsOptional()
  dateOfBirth?: string;

  @IsEmail()
  @MaxLength(100)
  @IsOptional()
  email?: string;

  @IsString()
  @Length(1, 10)
  @IsOptional()
  phone?: string;

  @IsIn(GENDER_CODES)
  @IsOptional()
  gender?: string;
}
