import { Inject, Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { CLOCK, Clock } from '../common/clock/clock';
import { RequestContext } from '../common/request-context/request-context';
import { Student } from '../student/entities/student.entity';
import { StudentAudit } from './entities/student-audit.entity';
import { STUDENT_AUDIT_FIELDS, TrackedStudentFields } from './student-audit.fields';
import { classifyStudentChanges, StudentChange } from './student-change.classifier';

@Injectable()
export class StudentAuditService {
  constructor(
    @InjectRepository(StudentAudit)
    private readonly auditRepository: Repository<StudentAudit>,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(STUDENT_AUDIT_FIELDS) private readonly trackedFields: TrackedStudentFields,
  ) {}

  /**
   * Appends the audit rows describing a student mutation. Must be given the
   * transaction's manager so the rows commit or roll back with the write.
   */
  async recordMutation(
    manager: EntityManager,
    before: readonly Student[],
    after: readonly Student[],
  ): Promise<StudentAudit[]> {
    const changes = classifyStudentChanges(before, after, this.trackedFields);
    return this.append(manager, changes);
  }

  async append(manager: EntityManager, changes: readonly StudentChange[]): Promise<StudentAudit[]> {
    if (changes.length === 0) return [];

    const changedAt = this.clock.now();
    const changedBy = RequestContext.actor();
    const rows = changes.map((change) =>
      manager.create(StudentAudit, { ...change, changedBy, changedAt }),
    );
    return manager.save(StudentAudit, rows);
  }

  /** Newest first. Works for deleted students too. */
  async findForStudent(studentId: number): Promise<StudentAudit[]> {
    return this.auditRepository.find({
      where: { studentId },
      order: { changedAt: 'DESC', id: 'DESC' },
    });
  }
}
