import { Module } from '@nestjs/common';
import { ConfigModule } from './config/config.module';
import { DatabaseModule } from './database/database.module';
import { StudentModule } from './student/student.module';

@Module({
  imports: [ConfigModule, DatabaseModule, StudentModule],
})
export class AppModule {}
