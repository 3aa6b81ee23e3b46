import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Enrollment } from '../enrollment/entities/enrollment.entity';
import { Student } from '../student/entities/student.entity';
import { ReportsController } from './reports.controller';
import { ReportsService } from './reports.service';

@Module({
  imports: [TypeOrmModule.forFeature([Student, Enrollment])],
  providers: [ReportsService],
  controllers: [ReportsController],
})
export class ReportsModule {}
