import { BadRequestException } from '@nestjs/common';
import { Student } from './student.entity';

const buildStudent = () => {
  const student = new Student();
  student.id = 1;
  student.rollNumber = 'R1';
  student.name = 'Alice';
  student.grades = [];
  return student;
};

describe('Student', () => {
  describe('addGrade', () => {
    it('should append a trimmed subject bound to the student', () => {
      const student = buildStudent();

      const grade = student.addGrade('  Math ', 80);

      expect(grade.subject).toBe('Math');
      expect(grade.grade).toBe(80);
      expect(grade.studentId).toBe(1);
      expect(student.grades).toHaveLength(1);
    });

    it('should overwrite an existing subject regardless of case', () => {
      const student = buildStudent();
      const first = student.addGrade('Math', 80);

      const second = student.addGrade('math', 90);

      expect(second).toBe(first);
      expect(student.grades).toHaveLength(1);
      expect(student.gradesAsRecord()).toEqual({ Math: 90 });
    });

    it('should reject an empty subject', () => {
      const student = buildStudent();

      expect(() => student.addGrade('   ', 50)).toThrow(new BadRequestException('Subject cannot be empty.'));
      expect(student.grades).toHaveLength(0);
    });

    it.each([-1, 101, Number.NaN])('should reject grade %p', (value) => {
      const student = buildStudent();

      expect(() => student.addGrade('Math', value)).toThrow('Grade must be between 0 and 100.');
    });

    it.each([0, 100])('should accept boundary grade %p', (value) => {
      const student = buildStudent();

      expect(student.addGrade('Math', value).grade).toBe(value);
    });
  });

  describe('calculateAverage', () => {
    it('should be null without grades', () => {
      expect(buildStudent().calculateAverage()).toBeNull();
    });

    it('should average all grades', () => {
      const student = buildStudent();
      student.addGrade('Math', 80);
      student.addGrade('Science', 90);

      expect(student.calculateAverage()).toBe(85);
    });

    it('should round to two decimals', () => {
      const student = buildStudent();
      student.addGrade('Math', 100);
      student.addGrade('Science', 100);
      student.addGrade('History', 99);

      expect(student.calculateAverage()).toBe(99.67);
    });
  });

  it('should expose details keyed by stored subject', () => {
    const student = buildStudent();
    student.addGrade('Math', 80);
    student.addGrade('MATH', 90);

    expect(student.toDetails()).toEqual({
      rollNumber: 'R1',
      name: 'Alice',
      grades: { Math: 90 },
      average: 90,
    });
  });
});
