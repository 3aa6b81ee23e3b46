import { Check, Column, Entity, PrimaryGeneratedColumn, Unique } from 'typeorm';
import { decimalTransformer } from '../../database/decimal.transformer';

@Entity('faculty')
@Unique('UQ_faculty_email', ['email'])
@Check('CHK_faculty_salary', `"salary" IS NULL OR "salary" >= 0`)
export class Faculty {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 150 })
  fullName!: string;

  @Column({ type: 'varchar', length: 100, nullable: true })
  department!: string | null;

  @Column({ type: 'varchar', length: 100, nullable: true })
  email!: string | null;

  @Column({ type: 'decimal', precision: 12, scale: 2, nullable: true, transformer: decimalTransformer })
  salary!: number | null;

  @Column({ type: 'date', nullable: true })
  hireDate!: string | null;
}
