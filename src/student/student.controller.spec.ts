import { Test, TestingModule } from '@nestjs/testing';
import { StudentAuditService } from '../audit/student-audit.service';
import { StudentController } from './student.controller';
import { StudentsService } from './student.service';

describe('StudentController', () => {
  let controller: StudentController;
  const mockStudentsService = {
    register: jest.fn(),
    fullName: jest.fn(),
    setActive: jest.fn(),
    remove: jest.fn(),
  };
  const mockAuditService = {
    findForStudent: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      controllers: [StudentController],
      providers: [
        { provide: StudentsService, useValue: mockStudentsService },
        { provide: StudentAuditService, useValue: mockAuditService },
      ],
    }).compile();

    controller = module.get<StudentController>(StudentController);
  });

  it('should return the id of a registered student', async () => {
    mockStudentsService.register.mockResolvedValue(12);
    await expect(controller.register({ firstName: 'Asha', lastName: 'Patel' })).resolves.toEqual({ id: 12 });
  });

  it('should wrap the full name', async () => {
    mockStudentsService.fullName.mockResolvedValue('');
    await expect(controller.fullName(99)).resolves.toEqual({ fullName: '' });
  });

  it('should toggle the active flag', async () => {
    mockStudentsService.setActive.mockResolvedValue({ id: 3, isActive: false });
    await controller.setActive(3, { isActive: false });
    expect(mockStudentsService.setActive).toHaveBeenCalledWith(3, false);
  });

  it('should read the audit trail from the audit service', async () => {
    mockAuditService.findForStudent.mockResolvedValue([]);
    await controller.audit(5);
    expect(mockAuditService.findForStudent).toHaveBeenCalledWith(5);
  });
});
