import { Student } from '../student/entities/student.entity';

export const STUDENT_AUDIT_FIELDS = 'STUDENT_AUDIT_FIELDS';

/** Extracts the value of one tracked field from a student row. */
export type StudentFieldReader = (student: Student) => string | null;

/**
 * Field label (as written to `changedField`) → reader. Updates touching any
 * other column leave no audit row.
 */
export type TrackedStudentFields = Readonly<Record<string, StudentFieldReader>>;

export const DEFAULT_TRACKED_STUDENT_FIELDS: TrackedStudentFields = {
  Email: (student) => student.email,
  Phone: (student) => student.phone,
};
