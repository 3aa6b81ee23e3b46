import { Check, Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { decimalTransformer } from '../../database/decimal.transformer';
import { Student } from '../../student/entities/student.entity';

export const DEFAULT_PAYMENT_MODE = 'Bank Transfer';

/**
 * One row per amount received from a student. Removed together with the
 * student.
 */
@Entity('payments')
@Index('IX_payments_student_paid_at', ['studentId', 'paidAt'])
@Check('CHK_payments_amount', `"amount" >= 0`)
export class Payment {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'int' })
  studentId!: number;

  @Column({ type: 'decimal', precision: 10, scale: 2, transformer: decimalTransformer })
  amount!: number;

  @Column({ default: () => 'CURRENT_TIMESTAMP' })
  paidAt!: Date;

  @Column({ type: 'varchar', length: 50, default: DEFAULT_PAYMENT_MODE })
  mode!: string;

  @Column({ type: 'varchar', length: 100, nullable: true })
  referenceNo!: string | null;

  @ManyToOne(() => Student, (student) => student.payments, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'studentId', foreignKeyConstraintName: 'FK_payments_student' })
  student!: Student;
}
