import {
  Body,
  Controller,
  Get,
  HttpException,
  Logger,
  NotFoundException,
  Param,
  Post,
  Redirect,
  Render,
  Req,
  Res,
  UseFilters,
} from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import { Request, Response } from 'express';
import { StudentTrackerService } from './student-tracker.service';
import { AddGradeFormDto, AddStudentFormDto } from './dto/student-forms.dto';
import { FormValidationFilter } from '../common/exceptions/form-validation.filter';
import { flash, takeFlash } from '../common/flash/flash';
import { formatAverage, parseGradeInput } from '../grades/grade-input';

interface RedirectTarget {
  url: string;
}

const studentUrl = (rollNumber: string) => `/student/${encodeURIComponent(rollNumber)}`;
const averageUrl = (rollNumber: string) => `/average/${encodeURIComponent(rollNumber)}`;

/** Server-rendered pages: forms, lists and flash notices. */
@ApiExcludeController()
@Controller()
@UseFilters(FormValidationFilter)
export class StudentPagesController {
  private readonly logger = new Logger(StudentPagesController.name);

  constructor(private readonly tracker: StudentTrackerService) {}

  @Get()
  @Render('index')
  index(@Req() req: Request, @Res({ passthrough: true }) res: Response) {
    return { title: 'Home', messages: takeFlash(req, res) };
  }

  @Get('students')
  @Render('students')
  async listStudents(@Req() req: Request, @Res({ passthrough: true }) res: Response) {
    const students = await this.tracker.listStudents();
    return {
      title: 'Students',
      messages: takeFlash(req, res),
      students: students.map((student) => ({
        ...student,
        detailsUrl: studentUrl(student.rollNumber),
        averageUrl: averageUrl(student.rollNumber),
      })),
    };
  }

  @Get('add_student')
  @Render('add_student')
  addStudentForm(@Req() req: Request, @Res({ passthrough: true }) res: Response) {
    return { title: 'Add Student', messages: takeFlash(req, res) };
  }

  @Post('add_student')
  @Redirect()
  async addStudent(
    @Body() form: AddStudentFormDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<RedirectTarget> {
    try {
      await this.tracker.addStudent(form.name, form.roll_number);
    } catch (error) {
      flash(res, 'error', `Error: ${this.describe(error)}`);
      return { url: '/add_student' };
    }
    flash(res, 'success', 'Student added successfully!');
    return { url: '/students' };
  }

  @Get('add_grade')
  @Render('add_grade')
  addGradeForm(@Req() req: Request, @Res({ passthrough: true }) res: Response) {
    return { title: 'Add Grade', messages: takeFlash(req, res) };
  }

  @Post('add_grade')
  @Redirect()
  async addGrade(
    @Body() form: AddGradeFormDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<RedirectTarget> {
    const grade = parseGradeInput(form.grade);
    if (grade === null) {
      flash(res, 'error', 'Grade must be a number.');
      return { url: '/add_grade' };
    }
    if (grade < 0 || grade > 100) {
      flash(res, 'error', 'Grade must be between 0 and 100.');
      return { url: '/add_grade' };
    }

    try {
      await this.tracker.addGrade(form.roll_number, form.subject, grade);
    } catch (error) {
      flash(res, 'error', `Error: ${this.describe(error)}`);
      return { url: '/add_grade' };
    }
    flash(res, 'success', 'Grade added successfully!');
    return { url: studentUrl(form.roll_number) };
  }

  @Get('student/:rollNumber')
  async studentDetails(
    @Param('rollNumber') rollNumber: string,
    @Req() req: Request,
    @Res() res: Response,
  ) {
    const details = await this.findOrRedirect(() => this.tracker.viewStudentDetails(rollNumber), res);
    if (!details) {
      return;
    }
    const grades = Object.entries(details.grades)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([subject, grade]) => ({ subject, grade }));

    res.render('student', {
      title: details.name,
      messages: takeFlash(req, res),
      student: { rollNumber: details.rollNumber, name: details.name, averageUrl: averageUrl(details.rollNumber) },
      grades,
      average: formatAverage(details.average),
    });
  }

  @Get('average/:rollNumber')
  async average(
    @Param('rollNumber') rollNumber: string,
    @Req() req: Request,
    @Res() res: Response,
  ) {
    const details = await this.findOrRedirect(() => this.tracker.viewStudentDetails(rollNumber), res);
    if (!details) {
      return;
    }
    res.render('average', {
      title: `${details.name}: average`,
      messages: takeFlash(req, res),
      student: { rollNumber: details.rollNumber, name: details.name, detailsUrl: studentUrl(details.rollNumber) },
      average: formatAverage(details.average),
    });
  }

  private async findOrRedirect<T>(lookup: () => Promise<T>, res: Response): Promise<T | null> {
    try {
      return await lookup();
    } catch (error) {
      if (error instanceof NotFoundException) {
        flash(res, 'error', 'Student not found.');
        res.redirect('/students');
        return null;
      }
      throw error;
    }
  }

  private describe(error: unknown): string {
    if (error instanceof HttpException) {
      return error.message;
    }
    this.logger.error('Unexpected failure while saving form', error instanceof Error ? error.stack : String(error));
    return error instanceof Error ? error.message : String(error);
  }
}
