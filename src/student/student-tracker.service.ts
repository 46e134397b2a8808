import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { Mutex } from 'async-mutex';
import { Student, StudentDetails, StudentSummary } from './entities/student.entity';
import { Grade } from '../grades/entity/grade.entity';
import { isUniqueViolation } from '../database/query-errors';
import { usesSingleConnection } from '../database/database-options';

/**
 * Student and grade operations. Every write is one transaction; reads use
 * the repository directly. On a single-connection store (sql.js) operations
 * run one at a time so transactions never nest.
 */
@Injectable()
export class StudentTrackerService {
  private readonly logger = new Logger(StudentTrackerService.name);
  private readonly connectionLock = new Mutex();

  constructor(
    @InjectRepository(Student)
    private readonly studentRepository: Repository<Student>,
    private readonly dataSource: DataSource,
  ) {}

  async addStudent(name: string, rollNumber: string): Promise<void> {
    const trimmedName = name.trim();
    const trimmedRollNumber = rollNumber.trim();
    if (!trimmedName || !trimmedRollNumber) {
      throw new BadRequestException('Name and Roll Number are required.');
    }

    try {
      await this.transaction(async (manager) => {
        const existing = await manager.findOne(Student, { where: { rollNumber: trimmedRollNumber } });
        if (existing) {
          throw this.duplicateRollNumber(trimmedRollNumber);
        }
        await manager.save(manager.create(Student, { name: trimmedName, rollNumber: trimmedRollNumber }));
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw this.duplicateRollNumber(trimmedRollNumber);
      }
      throw error;
    }

    this.logger.log(`Student ${trimmedRollNumber} created`);
  }

  async addGrade(rollNumber: string, subject: string, grade: number): Promise<void> {
    await this.transaction(async (manager) => {
      const student = await this.findStudentOrFail(rollNumber, manager);
      const touched = student.addGrade(subject, grade);
      await manager.save(Grade, touched);
    });

    this.logger.log(`Grade for ${subject.trim()} recorded on student ${rollNumber}`);
  }

  async viewStudentDetails(rollNumber: string): Promise<StudentDetails> {
    const student = await this.exclusive(() => this.findStudentOrFail(rollNumber));
    return student.toDetails();
  }

  async calculateAverage(rollNumber: string): Promise<number | null> {
    const student = await this.exclusive(() => this.findStudentOrFail(rollNumber));
    return student.calculateAverage();
  }

  async listStudents(): Promise<StudentSummary[]> {
    const students = await this.exclusive(() => this.studentRepository.find({ order: { id: 'ASC' } }));
    return students.map((student) => student.toSummary());
  }

  private transaction<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    return this.exclusive(() => this.dataSource.transaction(work));
  }

  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    return usesSingleConnection(this.dataSource.options) ? this.connectionLock.runExclusive(work) : work();
  }

  private async findStudentOrFail(rollNumber: string, manager?: EntityManager): Promise<Student> {
    const repository = manager ? manager.getRepository(Student) : this.studentRepository;
    const student = await repository.findOne({
      where: { rollNumber },
      relations: ['grades'],
    });
    if (!student) {
      throw new NotFoundException(`No student found with roll number ${rollNumber}.`);
    }
    return student;
  }

  private duplicateRollNumber(rollNumber: string): BadRequestException {
    return new BadRequestException(`Roll number '${rollNumber}' already exists.`);
  }
}
