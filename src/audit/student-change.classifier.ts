import { Student } from '../student/entities/student.entity';
import { StudentChangeType } from './entities/student-audit.entity';
import { TrackedStudentFields } from './student-audit.fields';

export interface StudentChange {
  studentId: number;
  changeType: StudentChangeType;
  changedField: string | null;
  oldValue: string | null;
  newValue: string | null;
}

const normalize = (value: string | null): string => value ?? '';

/**
 * Classifies one mutation from the rows it touched, as they were before and
 * after the write:
 *  - only in `after`: INSERT, one row per student
 *  - only in `before`: DELETE, one row per student
 *  - in both: UPDATE, one row per tracked field whose value changed
 *    (null and '' compare equal)
 */
export function classifyStudentChanges(
  before: readonly Student[],
  after: readonly Student[],
  trackedFields: TrackedStudentFields,
): StudentChange[] {
  const beforeById = new Map(before.map((student) => [student.id, student]));
  const afterIds = new Set(after.map((student) => student.id));
  const changes: StudentChange[] = [];

  for (const current of after) {
    const previous = beforeById.get(current.id);
    if (!previous) {
      changes.push({
        studentId: current.id,
        changeType: 'INSERT',
        changedField: null,
        oldValue: null,
        newValue: null,
      });
      continue;
    }

    for (const [field, read] of Object.entries(trackedFields)) {
      const oldValue = read(previous);
      const newValue = read(current);
      if (normalize(oldValue) === normalize(newValue)) continue;
      changes.push({ studentId: current.id, changeType: 'UPDATE', changedField: field, oldValue, newValue });
    }
  }

  for (const previous of before) {
    if (afterIds.has(previous.id)) continue;
    changes.push({
      studentId: previous.id,
      changeType: 'DELETE',
      changedField: null,
      oldValue: null,
      newValue: null,
    });
  }

  return changes;
}
