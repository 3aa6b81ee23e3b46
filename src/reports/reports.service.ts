import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Enrollment } from '../enrollment/entities/enrollment.entity';
import { Payment } from '../finance/entities/payment.entity';
import { Student } from '../student/entities/student.entity';

export interface StudentCourseRow {
  studentId: number;
  fullName: string;
  courseName: string;
  enrolledAt: Date;
}

export interface PaymentSummaryRow {
  studentId: number;
  fullName: string;
  totalPaid: number;
}

interface PaymentSummaryRaw {
  studentId: number | string;
  firstName: string;
  lastName: string;
  totalPaid: number | string | null;
}

@Injectable()
export class ReportsService {
  constructor(
    @InjectRepository(Student)
    private readonly studentRepository: Repository<Student>,
    @InjectRepository(Enrollment)
    private readonly enrollmentRepository: Repository<Enrollment>,
  ) {}

  /** Students with the courses they are enrolled in, optionally for one student. */
  async studentCourses(studentId?: number): Promise<StudentCourseRow[]> {
    const enrollments = await this.enrollmentRepository.find({
      where: studentId === undefined ? {} : { studentId },
      relations: { student: true, course: true },
      order: { studentId: 'ASC', enrolledAt: 'ASC', id: 'ASC' },
    });
    return enrollments.map((enrollment) => ({
      studentId: enrollment.studentId,
      fullName: `${enrollment.student.firstName} ${enrollment.student.lastName}`,
      courseName: enrollment.course.name,
      enrolledAt: enrollment.enrolledAt,
    }));
  }

  /** Total paid per student, students without payments included at 0. */
  async paymentSummary(): Promise<PaymentSummaryRow[]> {
    const rows = await this.studentRepository
      .createQueryBuilder('student')
      .leftJoin(Payment, 'payment', 'payment.studentId = student.id')
      .select('student.id', 'studentId')
      .addSelect('student.firstName', 'firstName')
      .addSelect('student.lastName', 'lastName')
      .addSelect('COALESCE(SUM(payment.amount), 0)', 'totalPaid')
      .groupBy('student.id')
      .addGroupBy('student.firstName')
      .addGroupBy('student.lastName')
      .orderBy('student.id', 'ASC')
      .getRawMany<PaymentSummaryRaw>();

    return rows.map((row) => ({
      studentId: Number(row.studentId),
      fullName: `${row.firstName} ${row.lastName}`,
      totalPaid: Number(row.totalPaid ?? 0),
    }));
  }
}
