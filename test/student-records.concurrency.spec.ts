import { RecordNotFoundError, UniquenessViolationError } from '../src/common/errors/record-errors';
import { Enrollment } from '../src/enrollment/entities/enrollment.entity';
import { Student } from '../src/student/entities/student.entity';
import { createHarness, StudentRecordsHarness, TEST_DATABASE_URL } from './utils/student-records.harness';

// Needs a server that runs transactions side by side; set TEST_DATABASE_URL to enable.
const describeOnPostgres = TEST_DATABASE_URL ? describe : describe.skip;

function outcomes<T>(results: PromiseSettledResult<T>[]) {
  const fulfilled = results.filter((r): r is PromiseFulfilledResult<T> => r.status === 'fulfilled');
  const reasons = results
    .filter((r): r is PromiseRejectedResult => r.status === 'rejected')
    .map((r): unknown => r.reason);
  return { fulfilled, reasons };
}

describeOnPostgres('Concurrent writes on PostgreSQL', () => {
  let h: StudentRecordsHarness;

  beforeEach(async () => {
    h = await createHarness({ engine: 'postgres' });
  });

  afterEach(async () => {
    await h.moduleRef.close();
  });

  it('should let exactly one of several identical enrollments succeed', async () => {
    const studentId = await h.students.register({ firstName: 'Ravi', lastName: 'Kumar' });
    const course = await h.courses.create({ name: 'Data Structures', code: 'CS102', credits: 3 });

    const { fulfilled, reasons } = outcomes(
      await Promise.allSettled([
        h.enrollments.enroll(studentId, course.id),
        h.enrollments.enroll(studentId, course.id),
        h.enrollments.enroll(studentId, course.id),
      ]),
    );

    expect(fulfilled).toHaveLength(1);
    expect(reasons).toHaveLength(2);
    for (const reason of reasons) {
      expect(reason).toBeInstanceOf(UniquenessViolationError);
      expect(reason).toMatchObject({ target: 'UQ_enrollments_student_course' });
    }
    expect(await h.dataSource.getRepository(Enrollment).count()).toBe(1);
  });

  it('should register only one of two students sharing an email', async () => {
    const { fulfilled, reasons } = outcomes(
      await Promise.allSettled([
        h.students.register({ firstName: 'Asha', lastName: 'Patel', email: 'asha.patel@example.com' }),
        h.students.register({ firstName: 'Asha', lastName: 'P', email: 'asha.patel@example.com' }),
      ]),
    );

    expect(fulfilled).toHaveLength(1);
    expect(reasons).toHaveLength(1);
    expect(reasons[0]).toMatchObject({ target: 'UQ_students_email' });
    expect(await h.dataSource.getRepository(Student).count()).toBe(1);
  });

  it('should chain the audit rows of overlapping email changes', async () => {
    const id = await h.students.register({ firstName: 'Asha', lastName: 'Patel', email: 'a@example.com' });

    await Promise.all([
      h.students.update(id, { email: 'b@example.com' }),
      h.students.update(id, { email: 'c@example.com' }),
    ]);

    const updates = (await h.audit.findForStudent(id))
      .filter((row) => row.changeType === 'UPDATE')
      .sort((a, b) => a.id - b.id);
    expect(updates).toHaveLength(2);
    expect(updates[0].oldValue).toBe('a@example.com');
    expect(updates[1].oldValue).toBe(updates[0].newValue);
    expect((await h.students.findOne(id)).email).toBe(updates[1].newValue);
  });

  it('should delete a student once when two deletions overlap', async () => {
    const id = await h.students.register({ firstName: 'Meena', lastName: 'Iyer' });

    const { fulfilled, reasons } = outcomes(
      await Promise.allSettled([h.students.remove(id), h.students.remove(id)]),
    );

    expect(fulfilled).toHaveLength(1);
    expect(reasons[0]).toBeInstanceOf(RecordNotFoundError);
    const deletes = (await h.audit.findForStudent(id)).filter((row) => row.changeType === 'DELETE');
    expect(deletes).toHaveLength(1);
  });
});
