import { Entity, Column, PrimaryGeneratedColumn, ManyToOne, JoinColumn, Unique } from 'typeorm';
import { Student } from '../../student/entities/student.entity';

@Entity('grades')
@Unique('uq_student_subject', ['studentId', 'subject'])
export class Grade {
  @PrimaryGeneratedColumn()
  id!: number;

  // Stored with the spelling it was first recorded under.
  @Column({ length: 100 })
  subject!: string;

  @Column({ type: 'double precision' })
  grade!: number;

  @Column()
  studentId!: number;

  @ManyToOne(() => Student, (student) => student.grades, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'studentId' })
  student!: Student;
}
