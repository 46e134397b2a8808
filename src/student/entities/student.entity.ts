import { BadRequestException } from '@nestjs/common';
import { Entity, Column, PrimaryGeneratedColumn, OneToMany } from 'typeorm';
import { Grade } from '../../grades/entity/grade.entity';

export interface StudentSummary {
  rollNumber: string;
  name: string;
}

export interface StudentDetails extends StudentSummary {
  grades: Record<string, number>;
  average: number | null;
}

@Entity('students')
export class Student {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ length: 50, unique: true })
  rollNumber!: string;

  @Column({ length: 200 })
  name!: string;

  // Removed together with the student (ON DELETE CASCADE).
  @OneToMany(() => Grade, (grade) => grade.student)
  grades!: Grade[];

  /**
   * Records a grade for a subject, overwriting the value when the subject is
   * already present under any letter case. Returns the grade row that changed.
   */
  addGrade(subject: string, value: number): Grade {
    const normalized = subject.trim();
    if (!normalized) {
      throw new BadRequestException('Subject cannot be empty.');
    }
    if (!(value >= 0 && value <= 100)) {
      throw new BadRequestException('Grade must be between 0 and 100.');
    }

    const key = normalized.toLowerCase();
    const existing = this.grades.find((g) => g.subject.toLowerCase() === key);
    if (existing) {
      existing.grade = value;
      return existing;
    }

    const grade = new Grade();
    grade.subject = normalized;
    grade.grade = value;
    grade.studentId = this.id;
    this.grades.push(grade);
    return grade;
  }

  /** Mean of all grades to two decimals, or null when nothing is recorded. */
  calculateAverage(): number | null {
    if (this.grades.length === 0) {
      return null;
    }
    const total = this.grades.reduce((sum, g) => sum + g.grade, 0);
    return Math.round((total / this.grades.length + Number.EPSILON) * 100) / 100;
  }

  gradesAsRecord(): Record<string, number> {
    return Object.fromEntries(this.grades.map((g) => [g.subject, g.grade]));
  }

  toSummary(): StudentSummary {
    return { rollNumber: this.rollNumber, name: this.name };
  }

  toDetails(): StudentDetails {
    return {
      ...this.toSummary(),
      grades: this.gradesAsRecord(),
      average: this.calculateAverage(),
    };
  }
}
