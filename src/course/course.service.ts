import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { RecordNotFoundError } from '../common/errors/record-errors';
import { writeTransaction } from '../database/write-transaction';
import { CreateCourseInput } from './dto/create-course.dto';
import { Course } from './entities/course.entity';

@Injectable()
export class CourseService {
  private readonly logger = new Logger(CourseService.name);

  constructor(
    @InjectRepository(Course)
    private readonly courseRepository: Repository<Course>,
    private readonly dataSource: DataSource,
  ) {}

  /** Credits and code uniqueness are left to the store's constraints. */
  async create(input: CreateCourseInput): Promise<Course> {
    const course = await writeTransaction(
      this.dataSource,
      'Course creation',
      (manager) =>
        manager.save(
          manager.create(Course, {
            name: input.name,
            code: input.code ?? null,
            credits: input.credits,
            description: input.description ?? null,
          }),
        ),
      { logger: this.logger },
    );
    this.logger.log(`Created course ${course.id}`);
    return course;
  }

  async findAll(): Promise<Course[]> {
    return this.courseRepository.find({ order: { id: 'ASC' } });
  }

  async findByCode(code: string): Promise<Course | null> {
    return this.courseRepository.findOne({ where: { code } });
  }

  /** Enrollments in the course go with it. */
  async remove(id: number): Promise<void> {
    await writeTransaction(
      this.dataSource,
      'Course deletion',
      async (manager) => {
        const result = await manager.delete(Course, { id });
        if (!result.affected) {
          throw new RecordNotFoundError('Course', id);
        }
      },
      { logger: this.logger },
    );
    this.logger.log(`Deleted course ${id}`);
  }
}
