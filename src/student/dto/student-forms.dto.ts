import { IsNotEmpty, IsString } from 'class-validator';

// Field names follow the HTML forms.

const STUDENT_FIELDS_REQUIRED = 'Name and Roll Number are required.';
const GRADE_FIELDS_REQUIRED = 'All fields are required.';

export class AddStudentFormDto {
  @IsString({ message: STUDENT_FIELDS_REQUIRED })
  @IsNotEmpty({ message: STUDENT_FIELDS_REQUIRED })
  name!: string;

  @IsString({ message: STUDENT_FIELDS_REQUIRED })
  @IsNotEmpty({ message: STUDENT_FIELDS_REQUIRED })
  roll_number!: string;
}

export class AddGradeFormDto {
  @IsString({ message: GRADE_FIELDS_REQUIRED })
  @IsNotEmpty({ message: GRADE_FIELDS_REQUIRED })
  roll_number!: string;

  @IsString({ message: GRADE_FIELDS_REQUIRED })
  @IsNotEmpty({ message: GRADE_FIELDS_REQUIRED })
  subject!: string;

  // Parsed by the controller so a non-numeric value gets its own notice.
  @IsString({ message: GRADE_FIELDS_REQUIRED })
  @IsNotEmpty({ message: GRADE_FIELDS_REQUIRED })
  grade!: string;
}
