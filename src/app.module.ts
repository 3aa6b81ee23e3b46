import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { AuditModule } from './audit/audit.module';
import { ClockModule } from './common/clock/clock.module';
import { RequestContextMiddleware } from './common/request-context/request-context.middleware';
import { ConfigModule } from './config/config.module';
import { CourseModule } from './course/course.module';
import { DatabaseModule } from './database/database.module';
import { EnrollmentModule } from './enrollment/enrollment.module';
import { FacultyModule } from './faculty/faculty.module';
import { FinanceModule } from './finance/finance.module';
import { ReportsModule } from './reports/reports.module';
import { StudentsModule } from './student/student.module';

@Module({
  imports: [
    ConfigModule,
    ClockModule,
    DatabaseModule,
    AuditModule,
    StudentsModule,
    CourseModule,
    FacultyModule,
    EnrollmentModule,
    FinanceModule,
    ReportsModule,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(RequestContextMiddleware).forRoutes('*');
  }
}
