import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

export type StudentChangeType = 'INSERT' | 'UPDATE' | 'DELETE';

/**
 * Append-only trail of student changes. `studentId` deliberately carries no
 * foreign key: rows outlive the student they describe.
 */
@Entity('student_audit')
export class StudentAudit {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index('IX_student_audit_student')
  @Column({ type: 'int' })
  studentId!: number;

  @Column({ type: 'varchar', length: 20 })
  changeType!: StudentChangeType;

  @Column({ type: 'varchar', length: 100, nullable: true })
  changedField!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true })
  oldValue!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true })
  newValue!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  changedBy!: string | null;

  @Column({ default: () => 'CURRENT_TIMESTAMP' })
  changedAt!: Date;
}
