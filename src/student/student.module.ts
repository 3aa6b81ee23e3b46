import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuditModule } from '../audit/audit.module';
import { Student } from './entities/student.entity';
import { StudentController } from './student.controller';
import { StudentsService } from './student.service';

@Module({
  imports: [TypeOrmModule.forFeature([Student]), AuditModule],
  providers: [StudentsService],
  controllers: [StudentController],
  exports: [StudentsService],
})
export class StudentsModule {}
