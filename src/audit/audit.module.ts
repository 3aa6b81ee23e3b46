import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { StudentAudit } from './entities/student-audit.entity';
import { DEFAULT_TRACKED_STUDENT_FIELDS, STUDENT_AUDIT_FIELDS } from './student-audit.fields';
import { StudentAuditService } from './student-audit.service';

@Module({
  imports: [TypeOrmModule.forFeature([StudentAudit])],
  providers: [
    StudentAuditService,
    { provide: STUDENT_AUDIT_FIELDS, useValue: DEFAULT_TRACKED_STUDENT_FIELDS },
  ],
  exports: [StudentAuditService],
})
export class AuditModule {}
