import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { writeTransaction } from '../database/write-transaction';
import { CreateFacultyInput } from './dto/create-faculty.dto';
import { Faculty } from './entities/faculty.entity';

@Injectable()
export class FacultyService {
  private readonly logger = new Logger(FacultyService.name);

  constructor(
    @InjectRepository(Faculty)
    private readonly facultyRepository: Repository<Faculty>,
    private readonly dataSource: DataSource,
  ) {}

  async create(input: CreateFacultyInput): Promise<Faculty> {
    const member = await writeTransaction(
      this.dataSource,
      'Faculty creation',
      (manager) =>
        manager.save(
          manager.create(Faculty, {
            fullName: input.fullName,
            department: input.department ?? null,
            email: input.email ?? null,
            salary: input.salary ?? null,
            hireDate: input.hireDate ?? null,
          }),
        ),
      { logger: this.logger },
    );
    this.logger.log(`Created faculty member ${member.id}`);
    return member;
  }

  async findAll(): Promise<Faculty[]> {
    return this.facultyRepository.find({ order: { id: 'ASC' } });
  }
}
