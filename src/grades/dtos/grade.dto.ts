import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsNumber, IsString, MaxLength } from 'class-validator';
import { Trim } from '../../common/transforms/trim.transform';

export class RecordGradeDto {
  @ApiProperty({ example: 'Math' })
  @Trim()
  @IsString()
  @IsNotEmpty({ message: 'Subject cannot be empty.' })
  @MaxLength(100)
  subject!: string;

  @ApiProperty({ minimum: 0, maximum: 100, example: 90 })
  @IsNumber({ allowNaN: false, allowInfinity: false }, { message: 'Grade must be a number.' })
  grade!: number;
}
