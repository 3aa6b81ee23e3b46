import { createHarness, START, StudentRecordsHarness } from './utils/student-records.harness';

describe('Student records end to end', () => {
  let h: StudentRecordsHarness;

  beforeEach(async () => {
    h = await createHarness();
  });

  afterEach(async () => {
    await h.moduleRef.close();
  });

  it('should register, enroll, take payment and audit an email change', async () => {
    const asha = await h.students.register({
      firstName: 'Asha',
      lastName: 'Patel',
      email: 'asha.patel@example.com',
      phone: '9876543210',
      gender: 'F',
    });
    const db101 = await h.courses.create({ name: 'Database Systems', code: 'DB101', credits: 4 });
    await h.enrollments.enroll(asha, db101.id);
    await h.payments.record({ studentId: asha, amount: 5000, referenceNo: 'TXN1001' });
    h.clock.advance(3_600_000);
    await h.students.update(asha, { email: 'asha2@example.com' });

    expect(await h.students.fullName(asha)).toBe('Asha Patel');
    expect(await h.payments.totalPaid(asha)).toBe(5000);
    expect(await h.reports.studentCourses(asha)).toEqual([
      { studentId: asha, fullName: 'Asha Patel', courseName: 'Database Systems', enrolledAt: new Date(START) },
    ]);

    const updates = (await h.audit.findForStudent(asha)).filter((row) => row.changeType === 'UPDATE');
    expect(updates).toHaveLength(1);
    expect(updates[0]).toMatchObject({
      changedField: 'Email',
      oldValue: 'asha.patel@example.com',
      newValue: 'asha2@example.com',
    });
    expect(updates[0].changedAt).toEqual(new Date('2026-01-15T10:30:00.000Z'));
  });

  describe('ReportsService', () => {
    let ravi: number;
    let meena: number;

    beforeEach(async () => {
      ravi = await h.students.register({ firstName: 'Ravi', lastName: 'Kumar' });
      meena = await h.students.register({ firstName: 'Meena', lastName: 'Iyer' });
      const cs102 = await h.courses.create({ name: 'Data Structures', code: 'CS102', credits: 3 });
      const wd103 = await h.courses.create({ name: 'Web Development', code: 'WD103', credits: 2 });

      await h.enrollments.enroll(meena, wd103.id);
      h.clock.advance(1_000);
      await h.enrollments.enroll(ravi, cs102.id);
      h.clock.advance(1_000);
      await h.enrollments.enroll(ravi, wd103.id);

      await h.payments.record({ studentId: ravi, amount: 4500, mode: 'Card' });
      await h.payments.record({ studentId: ravi, amount: 500.25 });
    });

    it('should list every enrollment grouped by student', async () => {
      const rows = await h.reports.studentCourses();
      expect(rows.map((row) => [row.fullName, row.courseName])).toEqual([
        ['Ravi Kumar', 'Data Structures'],
        ['Ravi Kumar', 'Web Development'],
        ['Meena Iyer', 'Web Development'],
      ]);
    });

    it('should narrow the course list to one student', async () => {
      const rows = await h.reports.studentCourses(meena);
      expect(rows).toEqual([
        { studentId: meena, fullName: 'Meena Iyer', courseName: 'Web Development', enrolledAt: new Date(START) },
      ]);
    });

    it('should total payments per student, including students who paid nothing', async () => {
      expect(await h.reports.paymentSummary()).toEqual([
        { studentId: ravi, fullName: 'Ravi Kumar', totalPaid: 5000.25 },
        { studentId: meena, fullName: 'Meena Iyer', totalPaid: 0 },
      ]);
    });

    it('should drop a deleted student from both reports', async () => {
      await h.students.remove(ravi);

      expect((await h.reports.studentCourses()).map((row) => row.studentId)).toEqual([meena]);
      expect(await h.reports.paymentSummary()).toEqual([
        { studentId: meena, fullName: 'Meena Iyer', totalPaid: 0 },
      ]);
    });
  });
});
