import { RecordNotFoundError, UniquenessViolationError } from '../src/common/errors/record-errors';
import { Enrollment } from '../src/enrollment/entities/enrollment.entity';
import { createHarness, START, StudentRecordsHarness } from './utils/student-records.harness';

describe('EnrollmentService', () => {
  let h: StudentRecordsHarness;
  let studentId: number;
  let courseId: number;

  beforeEach(async () => {
    h = await createHarness();
    studentId = await h.students.register({ firstName: 'Ravi', lastName: 'Kumar', email: 'ravi@example.com' });
    courseId = (await h.courses.create({ name: 'Data Structures', code: 'CS102', credits: 3 })).id;
  });

  afterEach(async () => {
    await h.moduleRef.close();
  });

  const enrollmentCount = () => h.dataSource.getRepository(Enrollment).count();

  it('should enroll with the default status and the clock as timestamp', async () => {
    const id = await h.enrollments.enroll(studentId, courseId);

    const [enrollment] = await h.enrollments.findForStudent(studentId);
    expect(enrollment.id).toBe(id);
    expect(enrollment.status).toBe('Enrolled');
    expect(enrollment.enrolledAt).toEqual(new Date(START));
    expect(enrollment.course.code).toBe('CS102');
  });

  it('should reject a second enrollment in the same course', async () => {
    await h.enrollments.enroll(studentId, courseId);

    const attempt = h.enrollments.enroll(studentId, courseId);
    await expect(attempt).rejects.toBeInstanceOf(UniquenessViolationError);
    await expect(attempt).rejects.toMatchObject({
      target: 'enrollments.studentId, enrollments.courseId',
      message: 'Enrollment failed: UNIQUE constraint failed: enrollments.studentId, enrollments.courseId',
    });
    expect(await enrollmentCount()).toBe(1);
  });

  it('should name the missing student', async () => {
    const attempt = h.enrollments.enroll(999, courseId);
    await expect(attempt).rejects.toBeInstanceOf(RecordNotFoundError);
    await expect(attempt).rejects.toMatchObject({ entity: 'Student', recordId: 999 });
    expect(await enrollmentCount()).toBe(0);
  });

  it('should name the missing course', async () => {
    await expect(h.enrollments.enroll(studentId, 777)).rejects.toThrow(
      'Course not found: id 777 does not exist',
    );
    expect(await enrollmentCount()).toBe(0);
  });

  it('should list a student\'s enrollments in enrollment order', async () => {
    const second = await h.courses.create({ name: 'Web Development', code: 'WD103', credits: 2 });
    await h.enrollments.enroll(studentId, second.id);
    h.clock.advance(5_000);
    await h.enrollments.enroll(studentId, courseId);

    const enrollments = await h.enrollments.findForStudent(studentId);
    expect(enrollments.map((e) => e.course.code)).toEqual(['WD103', 'CS102']);
  });

  it('should remove an enrollment by id', async () => {
    const id = await h.enrollments.enroll(studentId, courseId);
    await h.enrollments.unenroll(id);
    expect(await enrollmentCount()).toBe(0);
  });

  it('should fail with not found when removing an unknown enrollment', async () => {
    await expect(h.enrollments.unenroll(55)).rejects.toThrow('Enrollment not found: id 55 does not exist');
  });

  it('should drop enrollments when their course is deleted', async () => {
    await h.enrollments.enroll(studentId, courseId);

    await h.courses.remove(courseId);

    expect(await enrollmentCount()).toBe(0);
    expect((await h.students.findOne(studentId)).id).toBe(studentId);
  });
});
