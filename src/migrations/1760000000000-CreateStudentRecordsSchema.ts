import { MigrationInterface, QueryRunner, Table, TableColumnOptions } from 'typeorm';

const id = (): TableColumnOptions => ({
  name: 'id',
  type: 'integer',
  isPrimary: true,
  isGenerated: true,
  generationStrategy: 'increment',
});

const createdNow = (name: string): TableColumnOptions => ({
  name,
  type: 'timestamp',
  default: 'CURRENT_TIMESTAMP',
});

export const STUDENT_AUDIT_IMMUTABILITY_SQL = `
CREATE OR REPLACE FUNCTION student_audit_immutable() RETURNS trigger AS $$
BEGIN
  RAISE EXCEPTION 'student_audit is append-only';
END;
$$ LANGUAGE plpgsql;

CREATE TRIGGER trg_student_audit_immutable
  BEFORE UPDATE OR DELETE ON "student_audit"
  FOR EACH ROW EXECUTE FUNCTION student_audit_immutable();
`;

export const DROP_STUDENT_AUDIT_IMMUTABILITY_SQL = `
DROP TRIGGER IF EXISTS trg_student_audit_immutable ON "student_audit";
DROP FUNCTION IF EXISTS student_audit_immutable();
`;

/** The part of a query runner this migration drives. */
export type SchemaQueryRunner = Pick<QueryRunner, 'createTable' | 'dropTable' | 'query'>;

export class CreateStudentRecordsSchema1760000000000 implements MigrationInterface {
  name = 'CreateStudentRecordsSchema1760000000000';

  public async up(queryRunner: SchemaQueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'students',
        columns: [
          id(),
          { name: 'firstName', type: 'varchar', length: '50' },
          { name: 'lastName', type: 'varchar', length: '50' },
          { name: 'dateOfBirth', type: 'date', isNullable: true },
          { name: 'email', type: 'varchar', length: '100', isNullable: true },
          { name: 'phone', type: 'varchar', length: '10', isNullable: true },
          { name: 'gender', type: 'varchar', length: '1', isNullable: true },
          createdNow('admissionDate'),
          { name: 'isActive', type: 'boolean', default: true },
        ],
        uniques: [{ name: 'UQ_students_email', columnNames: ['email'] }],
        checks: [
          { name: 'CHK_students_gender', expression: `"gender" IN ('M', 'F', 'O')` },
          { name: 'CHK_students_first_name', expression: `length(trim("firstName")) > 0` },
          { name: 'CHK_students_last_name', expression: `length(trim("lastName")) > 0` },
        ],
        indices: [{ name: 'IX_students_email', columnNames: ['email'] }],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'courses',
        columns: [
          id(),
          { name: 'name', type: 'varchar', length: '150' },
          { name: 'code', type: 'varchar', length: '20', isNullable: true },
          { name: 'credits', type: 'smallint' },
          { name: 'description', type: 'varchar', length: '500', isNullable: true },
        ],
        uniques: [{ name: 'UQ_courses_code', columnNames: ['code'] }],
        checks: [{ name: 'CHK_courses_credits', expression: `"credits" BETWEEN 1 AND 10` }],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'faculty',
        columns: [
          id(),
          { name: 'fullName', type: 'varchar', length: '150' },
          { name: 'department', type: 'varchar', length: '100', isNullable: true },
          { name: 'email', type: 'varchar', length: '100', isNullable: true },
          { name: 'salary', type: 'decimal', precision: 12, scale: 2, isNullable: true },
          { name: 'hireDate', type: 'date', isNullable: true },
        ],
        uniques: [{ name: 'UQ_faculty_email', columnNames: ['email'] }],
        checks: [{ name: 'CHK_faculty_salary', expression: `"salary" IS NULL OR "salary" >= 0` }],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'enrollments',
        columns: [
          id(),
          { name: 'studentId', type: 'integer' },
          { name: 'courseId', type: 'integer' },
          createdNow('enrolledAt'),
          { name: 'status', type: 'varchar', length: '20', default: `'Enrolled'` },
        ],
        uniques: [{ name: 'UQ_enrollments_student_course', columnNames: ['studentId', 'courseId'] }],
        foreignKeys: [
          {
            name: 'FK_enrollments_student',
            columnNames: ['studentId'],
            referencedTableName: 'students',
            referencedColumnNames: ['id'],
            onDelete: 'CASCADE',
          },
          {
            name: 'FK_enrollments_course',
            columnNames: ['courseId'],
            referencedTableName: 'courses',
            referencedColumnNames: ['id'],
            onDelete: 'CASCADE',
          },
        ],
        indices: [
          { name: 'IX_enrollments_student', columnNames: ['studentId'] },
          { name: 'IX_enrollments_course', columnNames: ['courseId'] },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'payments',
        columns: [
          id(),
          { name: 'studentId', type: 'integer' },
          { name: 'amount', type: 'decimal', precision: 10, scale: 2 },
          createdNow('paidAt'),
          { name: 'mode', type: 'varchar', length: '50', default: `'Bank Transfer'` },
          { name: 'referenceNo', type: 'varchar', length: '100', isNullable: true },
        ],
        checks: [{ name: 'CHK_payments_amount', expression: `"amount" >= 0` }],
        foreignKeys: [
          {
            name: 'FK_payments_student',
            columnNames: ['studentId'],
            referencedTableName: 'students',
            referencedColumnNames: ['id'],
            onDelete: 'CASCADE',
          },
        ],
        indices: [{ name: 'IX_payments_student_paid_at', columnNames: ['studentId', 'paidAt'] }],
      }),
      true,
    );

    // No foreign key on studentId: audit rows outlive the student
    await queryRunner.createTable(
      new Table({
        name: 'student_audit',
        columns: [
          id(),
          { name: 'studentId', type: 'integer' },
          { name: 'changeType', type: 'varchar', length: '20' },
          { name: 'changedField', type: 'varchar', length: '100', isNullable: true },
          { name: 'oldValue', type: 'varchar', length: '500', isNullable: true },
          { name: 'newValue', type: 'varchar', length: '500', isNullable: true },
          { name: 'changedBy', type: 'varchar', length: '100', isNullable: true },
          createdNow('changedAt'),
        ],
        indices: [{ name: 'IX_student_audit_student', columnNames: ['studentId'] }],
      }),
      true,
    );

    await queryRunner.query(STUDENT_AUDIT_IMMUTABILITY_SQL);
  }

  public async down(queryRunner: SchemaQueryRunner): Promise<void> {
    await queryRunner.query(DROP_STUDENT_AUDIT_IMMUTABILITY_SQL);
    for (const table of ['student_audit', 'payments', 'enrollments', 'faculty', 'courses', 'students']) {
      await queryRunner.dropTable(table, true);
    }
  }
}
