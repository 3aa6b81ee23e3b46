import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { CLOCK, Clock } from '../common/clock/clock';
import { RecordNotFoundError } from '../common/errors/record-errors';
import { writeTransaction } from '../database/write-transaction';
import { Student } from '../student/entities/student.entity';
import { RecordPaymentInput } from './dtos/record-payment.dto';
import { DEFAULT_PAYMENT_MODE, Payment } from './entities/payment.entity';

interface PaymentTotalRaw {
  total: string | number | null;
}

@Injectable()
export class PaymentService {
  private readonly logger = new Logger(PaymentService.name);

  constructor(
    @InjectRepository(Payment)
    private readonly paymentRepository: Repository<Payment>,
    private readonly dataSource: DataSource,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Records a payment and returns its id. A negative amount is rejected by
   * `CHK_payments_amount` as a ConstraintViolationError.
   */
  async record(input: RecordPaymentInput): Promise<number> {
    const { studentId } = input;
    const payment = await writeTransaction(
      this.dataSource,
      'Payment recording',
      async (manager) => {
        if ((await manager.count(Student, { where: { id: studentId } })) === 0) {
          throw new RecordNotFoundError('Student', studentId);
        }
        return manager.save(
          manager.create(Payment, {
            studentId,
            amount: input.amount,
            paidAt: this.clock.now(),
            mode: input.mode ?? DEFAULT_PAYMENT_MODE,
            referenceNo: input.referenceNo ?? null,
          }),
        );
      },
      {
        logger: this.logger,
        references: [{ entity: 'Student', id: studentId, constraint: 'FK_payments_student' }],
      },
    );

    this.logger.log(`Recorded payment ${payment.id} for student ${studentId}`);
    return payment.id;
  }

  async findForStudent(studentId: number): Promise<Payment[]> {
    return this.paymentRepository.find({ where: { studentId }, order: { paidAt: 'ASC', id: 'ASC' } });
  }

  /** Sum of every payment by the student; 0 when there are none. */
  async totalPaid(studentId: number): Promise<number> {
    const raw = await this.paymentRepository
      .createQueryBuilder('payment')
      .select('COALESCE(SUM(payment.amount), 0)', 'total')
      .where('payment.studentId = :studentId', { studentId })
      .getRawOne<PaymentTotalRaw>();
    return Number(raw?.total ?? 0);
  }
}
