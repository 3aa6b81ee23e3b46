import { Body, Controller, Delete, Get, HttpCode, Param, ParseIntPipe, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CreateEnrollmentDto } from './dto/create-enrollment.dto';
import { EnrollmentService } from './enrollment.service';

@ApiTags('Enrollments')
@Controller('enrollments')
export class EnrollmentController {
  constructor(private readonly enrollmentService: EnrollmentService) {}

  @Post()
  @ApiOperation({ summary: 'Enroll a student in a course' })
  @ApiResponse({ status: 404, description: 'Student or course not found' })
  @ApiResponse({ status: 409, description: 'Student already enrolled in the course' })
  async enroll(@Body() dto: CreateEnrollmentDto) {
    const id = await this.enrollmentService.enroll(dto.studentId, dto.courseId);
    return { id };
  }

  @Get('student/:studentId')
  @ApiOperation({ summary: 'Enrollments of a student with their courses' })
  async findForStudent(@Param('studentId', ParseIntPipe) studentId: number) {
    return this.enrollmentService.findForStudent(studentId);
  }

  @Delete(':id')
  @HttpCode(204)
  @ApiOperation({ summary: 'Remove an enrollment' })
  async unenroll(@Param('id', ParseIntPipe) id: number) {
    await this.enrollmentService.unenroll(id);
  }
}
