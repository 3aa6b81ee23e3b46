import { Body, Controller, Delete, Get, HttpCode, Param, ParseIntPipe, Patch, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { StudentAuditService } from '../audit/student-audit.service';
import { CreateStudentDto } from './dto/create-student.dto';
import { BatchUpdateStudentsDto, SetStudentActiveDto, UpdateStudentDto } from './dto/update-student.dto';
import { StudentsService } from './student.service';

@ApiTags('Students')
@Controller('students')
export class StudentController {
  constructor(
    private readonly studentService: StudentsService,
    private readonly auditService: StudentAuditService,
  ) {}

  @Post()
  @ApiOperation({ summary: 'Register a student' })
  @ApiResponse({ status: 201, description: 'Student registered' })
  @ApiResponse({ status: 409, description: 'Email already registered' })
  async register(@Body() dto: CreateStudentDto) {
    const id = await this.studentService.register(dto);
    return { id };
  }

  @Get()
  @ApiOperation({ summary: 'List students' })
  async findAll() {
    return this.studentService.findAll();
  }

  @Patch()
  @ApiOperation({ summary: 'Apply the same change to several students' })
  async updateMany(@Body() dto: BatchUpdateStudentsDto) {
    return this.studentService.updateMany(dto.ids, dto.changes);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a student' })
  @ApiResponse({ status: 404, description: 'Student not found' })
  async findOne(@Param('id', ParseIntPipe) id: number) {
    return this.studentService.findOne(id);
  }

  @Get(':id/full-name')
  @ApiOperation({ summary: 'Full name of a student, empty when unknown' })
  async fullName(@Param('id', ParseIntPipe) id: number) {
    return { fullName: await this.studentService.fullName(id) };
  }

  @Get(':id/audit')
  @ApiOperation({ summary: 'Audit trail of a student, newest first' })
  async audit(@Param('id', ParseIntPipe) id: number) {
    return this.auditService.findForStudent(id);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update a student' })
  async update(@Param('id', ParseIntPipe) id: number, @Body() dto: UpdateStudentDto) {
    return this.studentService.update(id, dto);
  }

  @Patch(':id/active')
  @ApiOperation({ summary: 'Activate or deactivate a student' })
  async setActive(@Param('id', ParseIntPipe) id: number, @Body() dto: SetStudentActiveDto) {
    return this.studentService.setActive(id, dto.isActive);
  }

  @Delete(':id')
  @HttpCode(204)
  @ApiOperation({ summary: 'Delete a student with their enrollments and payments' })
  async remove(@Param('id', ParseIntPipe) id: number) {
    await this.studentService.remove(id);
  }
}
