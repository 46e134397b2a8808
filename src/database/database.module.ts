import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule } from '../config/config.module';
import { ConfigService } from '../config/config.service';
import { buildDatabaseOptions, DEFAULT_DATABASE_URL } from './database-options';

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        buildDatabaseOptions({
          url: configService.getOrDefault('DATABASE_URL', DEFAULT_DATABASE_URL),
          ssl: configService.getBoolean('DB_SSL', false),
          logging: configService.getOrDefault('NODE_ENV', 'development') === 'development',
        }),
    }),
  ],
})
export class DatabaseModule {}
