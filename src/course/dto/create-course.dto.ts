import { IsInt, IsNotEmpty, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';

export interface CreateCourseInput {
  name: string;
  code?: string | null;
  credits: number;
  description?: string | null;
}

export class CreateCourseDto implements CreateCourseInput {
  @IsString()
  @IsNotEmpty()
  @MaxLength(150)
  name!: string;

  @IsString()
  @MaxLength(20)
  @IsOptional()
  code?: string;

  @IsInt()
  @Min(1)
  @Max(10)
  credits!: number;

  @IsString()
  @MaxLength(500)
  @IsOptional()
  description?: string;
}
