import { StudentAudit } from '../audit/entities/student-audit.entity';
import { Course } from '../course/entities/course.entity';
import { Enrollment } from '../enrollment/entities/enrollment.entity';
import { Faculty } from '../faculty/entities/faculty.entity';
import { Payment } from '../finance/entities/payment.entity';
import { Student } from '../student/entities/student.entity';

export const STUDENT_RECORDS_ENTITIES = [Student, Course, Faculty, Enrollment, Payment, StudentAudit];
