import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Student } from './entities/student.entity';
import { Grade } from '../grades/entity/grade.entity';
import { StudentTrackerService } from './student-tracker.service';
import { StudentPagesController } from './student-pages.controller';
import { StudentApiController } from './student-api.controller';

@Module({
  imports: [TypeOrmModule.forFeature([Student, Grade])],
  controllers: [StudentPagesController, StudentApiController],
  providers: [StudentTrackerService],
  exports: [StudentTrackerService],
})
export class StudentModule {}
