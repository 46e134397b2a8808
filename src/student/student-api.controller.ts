import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiCreatedResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { StudentTrackerService } from './student-tracker.service';
import { CreateStudentDto } from './dto/create-student.dto';
import { StudentAverageDto, StudentDetailsDto, StudentSummaryDto } from './dto/student-details.dto';
import { RecordGradeDto } from '../grades/dtos/grade.dto';
import { StudentDetails, StudentSummary } from './entities/student.entity';

@ApiTags('Students')
@Controller('api/v1/students')
export class StudentApiController {
  constructor(private readonly tracker: StudentTrackerService) {}

  @Get()
  @ApiOperation({ summary: 'List all students' })
  @ApiOkResponse({ type: [StudentSummaryDto] })
  listStudents(): Promise<StudentSummary[]> {
    return this.tracker.listStudents();
  }

  @Post()
  @ApiOperation({ summary: 'Create a student' })
  @ApiCreatedResponse({ type: StudentDetailsDto })
  @ApiBadRequestResponse({ description: 'Missing fields or roll number already taken' })
  async createStudent(@Body() dto: CreateStudentDto): Promise<StudentDetails> {
    await this.tracker.addStudent(dto.name, dto.rollNumber);
    return this.tracker.viewStudentDetails(dto.rollNumber.trim());
  }

  @Get(':rollNumber')
  @ApiOperation({ summary: 'Get a student with grades and average' })
  @ApiOkResponse({ type: StudentDetailsDto })
  @ApiNotFoundResponse({ description: 'Unknown roll number' })
  getStudent(@Param('rollNumber') rollNumber: string): Promise<StudentDetails> {
    return this.tracker.viewStudentDetails(rollNumber);
  }

  @Get(':rollNumber/average')
  @ApiOperation({ summary: "Get a student's average grade" })
  @ApiOkResponse({ type: StudentAverageDto })
  @ApiNotFoundResponse({ description: 'Unknown roll number' })
  async getAverage(@Param('rollNumber') rollNumber: string): Promise<StudentAverageDto> {
    const average = await this.tracker.calculateAverage(rollNumber);
    return { rollNumber, average };
  }

  @Post(':rollNumber/grades')
  @ApiOperation({ summary: 'Record or overwrite the grade for a subject' })
  @ApiCreatedResponse({ type: StudentDetailsDto })
  @ApiBadRequestResponse({ description: 'Empty subject or grade outside 0-100' })
  @ApiNotFoundResponse({ description: 'Unknown roll number' })
  async recordGrade(
    @Param('rollNumber') rollNumber: string,
    @Body() dto: RecordGradeDto,
  ): Promise<StudentDetails> {
    await this.tracker.addGrade(rollNumber, dto.subject, dto.grade);
    return this.tracker.viewStudentDetails(rollNumber);
  }
}
