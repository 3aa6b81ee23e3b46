import { IsDateString, IsEmail, IsNotEmpty, IsNumber, IsOptional, IsString, MaxLength, Min } from 'class-validator';

export interface CreateFacultyInput {
  fullName: string;
  department?: string | null;
  email?: string | null;
  salary?: number | null;
  hireDate?: string | null;
}

export class CreateFacultyDto implements CreateFacultyInput {
  @IsString()
  @IsNotEmpty()
  @MaxLength(150)
  fullName!: string;

  @IsString()
  @MaxLength(100)
  @IsOptional()
  department?: string;

  @IsEmail()
  @MaxLength(100)
  @IsOptional()
  email?: string;

  @IsNumber({ maxDecimalPlaces: 2 })
  @Min(0)
  @IsOptional()
  salary?: number;

  @IsDateString()
  @IsOptional()
  hireDate?: string;
}
