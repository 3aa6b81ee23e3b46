import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn, Unique } from 'typeorm';
import { Course } from '../../course/entities/course.entity';
import { Student } from '../../student/entities/student.entity';

export const DEFAULT_ENROLLMENT_STATUS = 'Enrolled';

/** At most one row per (student, course); removed with either parent. */
@Entity('enrollments')
@Unique('UQ_enrollments_student_course', ['studentId', 'courseId'])
export class Enrollment {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index('IX_enrollments_student')
  @Column({ type: 'int' })
  studentId!: number;

  @Index('IX_enrollments_course')
  @Column({ type: 'int' })
  courseId!: number;

  @Column({ default: () => 'CURRENT_TIMESTAMP' })
  enrolledAt!: Date;

  @Column({ type: 'varchar', length: 20, default: DEFAULT_ENROLLMENT_STATUS })
  status!: string;

  @ManyToOne(() => Student, (student) => student.enrollments, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'studentId', foreignKeyConstraintName: 'FK_enrollments_student' })
  student!: Student;

  @ManyToOne(() => Course, (course) => course.enrollments, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'courseId', foreignKeyConstraintName: 'FK_enrollments_course' })
  course!: Course;
}
