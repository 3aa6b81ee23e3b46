import { Check, Column, Entity, OneToMany, PrimaryGeneratedColumn, Unique } from 'typeorm';
import { Enrollment } from '../../enrollment/entities/enrollment.entity';

@Entity('courses')
@Unique('UQ_courses_code', ['code'])
@Check('CHK_courses_credits', `"credits" BETWEEN 1 AND 10`)
export class Course {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 150 })
  name!: string;

  @Column({ type: 'varchar', length: 20, nullable: true })
  code!: string | null;

  @Column({ type: 'smallint' })
  credits!: number;

  @Column({ type: 'varchar', length: 500, nullable: true })
  description!: string | null;

  @OneToMany(() => Enrollment, (enrollment) => enrollment.course)
  enrollments!: Enrollment[];
}
