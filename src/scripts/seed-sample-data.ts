import 'reflect-metadata';
import { INestApplicationContext, Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { RequestContext } from '../common/request-context/request-context';
import { CourseService } from '../course/course.service';
import { EnrollmentService } from '../enrollment/enrollment.service';
import { FacultyService } from '../faculty/faculty.service';
import { PaymentService } from '../finance/payment.service';
import { StudentsService } from '../student/student.service';

const logger = new Logger('SeedSampleData');

async function seed(app: INestApplicationContext) {
  const students = app.get(StudentsService);
  const courses = app.get(CourseService);
  const faculty = app.get(FacultyService);
  const enrollments = app.get(EnrollmentService);
  const payments = app.get(PaymentService);

  const asha = await students.register({
    firstName: 'Asha',
    lastName: 'Patel',
    dateOfBirth: '2003-08-14',
    email: 'asha.patel@example.com',
    phone: '9988776655',
    gender: 'F',
  });
  const ravi = await students.register({
    firstName: 'Ravi',
    lastName: 'Kumar',
    dateOfBirth: '2002-05-30',
    email: 'ravi.kumar@example.com',
    phone: '9876543210',
    gender: 'M',
  });
  await students.register({
    firstName: 'Meena',
    lastName: 'Iyer',
    dateOfBirth: '2001-12-01',
    email: 'meena.iyer@example.com',
    phone: '9123456789',
    gender: 'F',
  });

  const databases = await courses.create({
    name: 'Database Systems',
    code: 'DB101',
    credits: 4,
    description: 'Introduction to relational databases and SQL',
  });
  const dataStructures = await courses.create({
    name: 'Data Structures',
    code: 'CS102',
    credits: 3,
    description: 'Arrays, lists, trees, graphs, algorithms',
  });
  await courses.create({
    name: 'Web Development',
    code: 'WD103',
    credits: 3,
    description: 'HTML, CSS, JavaScript, Server-side basics',
  });

  await faculty.create({
    fullName: 'Dr. Suresh Rao',
    department: 'Computer Science',
    email: 'suresh.rao@example.com',
    salary: 75000,
    hireDate: '2019-07-01',
  });
  await faculty.create({
    fullName: 'Ms. Anita Desai',
    department: 'Computer Science',
    email: 'anita.desai@example.com',
    salary: 45000,
    hireDate: '2021-03-15',
  });

  await enrollments.enroll(asha, databases.id);
  await enrollments.enroll(ravi, databases.id);
  await enrollments.enroll(ravi, dataStructures.id);

  await payments.record({ studentId: asha, amount: 5000, mode: 'Bank Transfer', referenceNo: 'TXN1001' });
  await payments.record({ studentId: ravi, amount: 4500, mode: 'Card', referenceNo: 'TXN1002' });
}

async function main() {
  const app = await NestFactory.createApplicationContext(AppModule);
  try {
    await RequestContext.run({ requestId: 'seed', actor: 'seed-script' }, () => seed(app));
    logger.log('Sample data loaded');
  } finally {
    await app.close();
  }
}

main().catch((error: unknown) => {
  logger.error('Failed to load sample data', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
