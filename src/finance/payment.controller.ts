import { Body, Controller, Get, Param, ParseIntPipe, Post } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { RecordPaymentDto } from './dtos/record-payment.dto';
import { PaymentService } from './payment.service';

@ApiTags('Payments')
@Controller('payments')
export class PaymentController {
  constructor(private readonly paymentService: PaymentService) {}

  @Post()
  @ApiOperation({ summary: 'Record a payment from a student' })
  @ApiResponse({ status: 404, description: 'Student not found' })
  async record(@Body() dto: RecordPaymentDto) {
    const id = await this.paymentService.record(dto);
    return { id };
  }

  @Get('student/:studentId')
  @ApiOperation({ summary: 'Payments made by a student' })
  async findForStudent(@Param('studentId', ParseIntPipe) studentId: number) {
    return this.paymentService.findForStudent(studentId);
  }

  @Get('student/:studentId/total')
  @ApiOperation({ summary: 'Total paid by a student' })
  async totalPaid(@Param('studentId', ParseIntPipe) studentId: number) {
    return { studentId, totalPaid: await this.paymentService.totalPaid(studentId) };
  }
}
