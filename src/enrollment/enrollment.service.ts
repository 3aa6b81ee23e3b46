import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { CLOCK, Clock } from '../common/clock/clock';
import { RecordNotFoundError } from '../common/errors/record-errors';
import { Course } from '../course/entities/course.entity';
import { writeTransaction } from '../database/write-transaction';
import { Student } from '../student/entities/student.entity';
import { DEFAULT_ENROLLMENT_STATUS, Enrollment } from './entities/enrollment.entity';

@Injectable()
export class EnrollmentService {
  private readonly logger = new Logger(EnrollmentService.name);

  constructor(
    @InjectRepository(Enrollment)
    private readonly enrollmentRepository: Repository<Enrollment>,
    private readonly dataSource: DataSource,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Enrolls an existing student in an existing course and returns the new
   * enrollment id.
   *
   * The existence checks only cover the two references. A duplicate
   * (student, course) pair is caught by `UQ_enrollments_student_course`
   * during the insert and surfaces as a UniquenessViolationError, so two
   * concurrent attempts cannot both succeed.
   */
  async enroll(studentId: number, courseId: number): Promise<number> {
    const enrollment = await writeTransaction(
      this.dataSource,
      'Enrollment',
      async (manager) => {
        if ((await manager.count(Student, { where: { id: studentId } })) === 0) {
          throw new RecordNotFoundError('Student', studentId);
        }
        if ((await manager.count(Course, { where: { id: courseId } })) === 0) {
          throw new RecordNotFoundError('Course', courseId);
        }

        return manager.save(
          manager.create(Enrollment, {
            studentId,
            courseId,
            enrolledAt: this.clock.now(),
            status: DEFAULT_ENROLLMENT_STATUS,
          }),
        );
      },
      {
        logger: this.logger,
        references: [
          { entity: 'Student', id: studentId, constraint: 'FK_enrollments_student' },
          { entity: 'Course', id: courseId, constraint: 'FK_enrollments_course' },
        ],
      },
    );

    this.logger.log(`Enrolled student ${studentId} in course ${courseId} (enrollment ${enrollment.id})`);
    return enrollment.id;
  }

  async unenroll(enrollmentId: number): Promise<void> {
    const result = await this.enrollmentRepository.delete({ id: enrollmentId });
    if (!result.affected) {
      throw new RecordNotFoundError('Enrollment', enrollmentId);
    }
    this.logger.log(`Removed enrollment ${enrollmentId}`);
  }

  async findForStudent(studentId: number): Promise<Enrollment[]> {
    return this.enrollmentRepository.find({
      where: { studentId },
      relations: { course: true },
      order: { enrolledAt: 'ASC', id: 'ASC' },
    });
  }
}
