import { MigrationInterface, QueryRunner, Table } from 'typeorm';

export class CreateStudentsAndGrades1760000000000 implements MigrationInterface {
  name = 'CreateStudentsAndGrades1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'students',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          {
            name: 'rollNumber',
            type: 'varchar',
            length: '50',
            isNullable: false,
          },
          {
            name: 'name',
            type: 'varchar',
            length: '200',
            isNullable: false,
          },
        ],
        uniques: [
          {
            name: 'UQ_students_rollNumber',
            columnNames: ['rollNumber'],
          },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'grades',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          {
            name: 'subject',
            type: 'varchar',
            length: '100',
            isNullable: false,
          },
          {
            name: 'grade',
            type: 'double precision',
            isNullable: false,
          },
          {
            name: 'studentId',
            type: 'integer',
            isNullable: false,
          },
        ],
        uniques: [
          {
            name: 'uq_student_subject',
            columnNames: ['studentId', 'subject'],
          },
        ],
        foreignKeys: [
          {
            name: 'FK_grades_student',
            columnNames: ['studentId'],
            referencedTableName: 'students',
            referencedColumnNames: ['id'],
            onDelete: 'CASCADE',
          },
        ],
        indices: [
          {
            name: 'IDX_grades_studentId',
            columnNames: ['studentId'],
          },
        ],
      }),
      true,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('grades', true);
    await queryRunner.dropTable('students', true);
  }
}
