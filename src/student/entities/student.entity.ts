import {
  Check,
  Column,
  Entity,
  Index,
  OneToMany,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { Enrollment } from '../../enrollment/entities/enrollment.entity';
import { Payment } from '../../finance/entities/payment.entity';

export const GENDER_CODES = ['M', 'F', 'O'] as const;

@Entity('students')
@Unique('UQ_students_email', ['email'])
@Check('CHK_students_gender', `"gender" IN ('M', 'F', 'O')`)
@Check('CHK_students_first_name', `length(trim("firstName")) > 0`)
@Check('CHK_students_last_name', `length(trim("lastName")) > 0`)
export class Student {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 50 })
  firstName!: string;

  @Column({ type: 'varchar', length: 50 })
  lastName!: string;

  /** ISO calendar date, YYYY-MM-DD */
  @Column({ type: 'date', nullable: true })
  dateOfBirth!: string | null;

  @Index('IX_students_email')
  @Column({ type: 'varchar', length: 100, nullable: true })
  email!: string | null;

  @Column({ type: 'varchar', length: 10, nullable: true })
  phone!: string | null;

  @Column({ type: 'varchar', length: 1, nullable: true })
  gender!: string | null;

  @Column({ default: () => 'CURRENT_TIMESTAMP' })
  admissionDate!: Date;

  @Column({ default: true })
  isActive!: boolean;

  @OneToMany(() => Enrollment, (enrollment) => enrollment.student)
  enrollments!: Enrollment[];

  @OneToMany(() => Payment, (payment) => payment.student)
  payments!: Payment[];
}
