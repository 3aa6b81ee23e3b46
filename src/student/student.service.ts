import { Inject, Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, In, Repository } from 'typeorm';
import { StudentAuditService } from '../audit/student-audit.service';
import { CLOCK, Clock } from '../common/clock/clock';
import { RecordNotFoundError } from '../common/errors/record-errors';
import { writeLockFor } from '../database/row-lock';
import { writeTransaction } from '../database/write-transaction';
import { RegisterStudentInput } from './dto/create-student.dto';
import { UpdateStudentInput } from './dto/update-student.dto';
import { Student } from './entities/student.entity';

type StudentPatch = Partial<Pick<Student, keyof UpdateStudentInput>>;

const UPDATABLE_FIELDS: ReadonlyArray<keyof UpdateStudentInput> = [
  'firstName',
  'lastName',
  'dateOfBirth',
  'email',
  'phone',
  'gender',
  'isActive',
];

/** Keeps only the fields the caller actually supplied. */
function toPatch(input: UpdateStudentInput): StudentPatch {
  const patch: StudentPatch = {};
  for (const field of UPDATABLE_FIELDS) {
    if (input[field] !== undefined) {
      Object.assign(patch, { [field]: input[field] });
    }
  }
  return patch;
}

/**
 * Every mutation here writes its audit rows through the same transaction
 * as the student write.
 */
@Injectable()
export class StudentsService {
  private readonly logger = new Logger(StudentsService.name);

  constructor(
    @InjectRepository(Student)
    private readonly studentRepository: Repository<Student>,
    private readonly dataSource: DataSource,
    private readonly auditService: StudentAuditService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async register(input: RegisterStudentInput): Promise<number> {
    const student = await writeTransaction(
      this.dataSource,
      'Student registration',
      async (manager) => {
        const created = await manager.save(
          manager.create(Student, {
            firstName: input.firstName,
            lastName: input.lastName,
            dateOfBirth: input.dateOfBirth ?? null,
            email: input.email ?? null,
            phone: input.phone ?? null,
            gender: input.gender ?? null,
            admissionDate: this.clock.now(),
            isActive: true,
          }),
        );
        await this.auditService.recordMutation(manager, [], [created]);
        return created;
      },
      { logger: this.logger },
    );

    this.logger.log(`Registered student ${student.id}`);
    return student.id;
  }

  async update(id: number, input: UpdateStudentInput): Promise<Student> {
    const [student] = await this.updateMany([id], input);
    return student;
  }

  /** Applies the same change to every listed student in one statement. */
  async updateMany(ids: number[], input: UpdateStudentInput): Promise<Student[]> {
    const patch = toPatch(input);
    const updated = await writeTransaction(
      this.dataSource,
      'Student update',
      async (manager) => {
        const before = await this.loadAll(manager, ids);
        if (Object.keys(patch).length === 0) return before;

        await manager.update(Student, { id: In(ids) }, patch);
        const after = await this.loadAll(manager, ids);
        await this.auditService.recordMutation(manager, before, after);
        return after;
      },
      { logger: this.logger },
    );

    this.logger.log(`Updated students ${updated.map((s) => s.id).join(', ')}`);
    return updated;
  }

  async setActive(id: number, isActive: boolean): Promise<Student> {
    return this.update(id, { isActive });
  }

  /**
   * Deletes the student; the store cascades their enrollments and payments.
   * Audit rows are kept.
   */
  async remove(id: number): Promise<void> {
    await writeTransaction(
      this.dataSource,
      'Student deletion',
      async (manager) => {
        const before = await this.loadAll(manager, [id]);
        const result = await manager.delete(Student, { id });
        if (!result.affected) {
          throw new RecordNotFoundError('Student', id);
        }
        await this.auditService.recordMutation(manager, before, []);
      },
      { logger: this.logger },
    );
    this.logger.log(`Deleted student ${id}`);
  }

  async findOne(id: number): Promise<Student> {
    const student = await this.studentRepository.findOne({ where: { id } });
    if (!student) {
      throw new RecordNotFoundError('Student', id);
    }
    return student;
  }

  async findAll(): Promise<Student[]> {
    return this.studentRepository.find({ order: { id: 'ASC' } });
  }

  /** "First Last", or an empty string when there is no such student. */
  async fullName(id: number): Promise<string> {
    const student = await this.studentRepository.findOne({
      where: { id },
      select: { id: true, firstName: true, lastName: true },
    });
    return student ? `${student.firstName} ${student.lastName}` : '';
  }

  /** Locks the rows until commit so the audit sees the state this write replaces. */
  private async loadAll(manager: EntityManager, ids: number[]): Promise<Student[]> {
    const students = await manager.find(Student, {
      where: { id: In(ids) },
      order: { id: 'ASC' },
      lock: writeLockFor(manager),
    });
    const found = new Set(students.map((s) => s.id));
    const missing = ids.find((id) => !found.has(id));
    if (missing !== undefined) {
      throw new RecordNotFoundError('Student', missing);
    }
    return students;
  }
}
