import { BadRequestException, Controller, Get, Query } from '@nestjs/common';
import { ApiOperation, ApiQuery, ApiTags } from '@nestjs/swagger';
import { ReportsService } from './reports.service';

@ApiTags('Reports')
@Controller('reports')
export class ReportsController {
  constructor(private readonly reportsService: ReportsService) {}

  @Get('student-courses')
  @ApiOperation({ summary: 'Students with their enrolled courses and enrollment dates' })
  @ApiQuery({ name: 'studentId', required: false, type: Number })
  async studentCourses(@Query('studentId') studentId?: string) {
    if (studentId === undefined) {
      return this.reportsService.studentCourses();
    }
    if (!/^\d+$/.test(studentId)) {
      throw new BadRequestException('studentId must be an integer');
    }
    return this.reportsService.studentCourses(Number.parseInt(studentId, 10));
  }

  @Get('payment-summary')
  @ApiOperation({ summary: 'Total paid per student' })
  async paymentSummary() {
    return this.reportsService.paymentSummary();
  }
}
