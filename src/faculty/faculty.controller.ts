import { Body, Controller, Get, Post } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { CreateFacultyDto } from './dto/create-faculty.dto';
import { FacultyService } from './faculty.service';

@ApiTags('Faculty')
@Controller('faculty')
export class FacultyController {
  constructor(private readonly facultyService: FacultyService) {}

  @Post()
  @ApiOperation({ summary: 'Add a faculty member' })
  async create(@Body() dto: CreateFacultyDto) {
    return this.facultyService.create(dto);
  }

  @Get()
  @ApiOperation({ summary: 'List faculty' })
  async findAll() {
    return this.facultyService.findAll();
  }
}
