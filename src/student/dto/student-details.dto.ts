import { ApiProperty } from '@nestjs/swagger';

export class StudentSummaryDto {
  @ApiProperty({ example: 'R1' })
  rollNumber!: string;

  @ApiProperty({ example: 'Alice' })
  name!: string;
}

export class StudentDetailsDto extends StudentSummaryDto {
  @ApiProperty({
    type: 'object',
    additionalProperties: { type: 'number' },
    example: { Math: 90 },
  })
  grades!: Record<string, number>;

  @ApiProperty({ type: Number, nullable: true, example: 90 })
  average!: number | null;
}

export class StudentAverageDto {
  @ApiProperty({ example: 'R1' })
  rollNumber!: string;

  @ApiProperty({ type: Number, nullable: true, example: 85.5 })
  average!: number | null;
}
