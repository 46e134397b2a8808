import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { Trim } from '../../common/transforms/trim.transform';

export class CreateStudentDto {
  @ApiProperty({ example: 'Alice' })
  @Trim()
  @IsString()
  @IsNotEmpty({ message: 'Name and Roll Number are required.' })
  @MaxLength(200)
  name!: string;

  @ApiProperty({ example: 'R1', description: 'Unique roll number' })
  @Trim()
  @IsString()
  @IsNotEmpty({ message: 'Name and Roll Number are required.' })
  @MaxLength(50)
  rollNumber!: string;
}
