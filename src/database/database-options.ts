import { DataSourceOptions } from 'typeorm';
import { Student } from '../student/entities/student.entity';
import { Grade } from '../grades/entity/grade.entity';
import { CreateStudentsAndGrades1760000000000 } from '../migrations/1760000000000-CreateStudentsAndGrades';

export const DEFAULT_DATABASE_URL = 'sqlite:///students.db';

const SQLITE_PREFIX = 'sqlite:///';
const MEMORY_DATABASE = ':memory:';

/** sql.js runs every statement on one shared connection. */
export function usesSingleConnection(options: DataSourceOptions): boolean {
  return options.type === 'sqljs';
}

export interface DatabaseSettings {
  url: string;
  ssl?: boolean;
  logging?: boolean;
}

/**
 * Maps a DATABASE_URL onto TypeORM options. PostgreSQL URLs go to `pg`,
 * `sqlite:///<path>` to a sql.js database saved to that file after every
 * write, `sqlite:///:memory:` to one that is never saved.
 */
export function buildDatabaseOptions(settings: DatabaseSettings): DataSourceOptions {
  const common = {
    entities: [Student, Grade],
    migrations: [CreateStudentsAndGrades1760000000000],
    migrationsRun: true,
    synchronize: false,
    logging: settings.logging ?? false,
  };
  const url = settings.url.trim();

  if (url.startsWith('postgres://') || url.startsWith('postgresql://')) {
    return {
      ...common,
      type: 'postgres',
      url,
      ssl: settings.ssl ? { rejectUnauthorized: false } : false,
    };
  }

  if (url.startsWith(SQLITE_PREFIX) && url.length > SQLITE_PREFIX.length) {
    const location = url.slice(SQLITE_PREFIX.length);
    if (location === MEMORY_DATABASE) {
      return { ...common, type: 'sqljs' };
    }
    return {
      ...common,
      type: 'sqljs',
      location,
      autoSave: true,
    };
  }

  throw new Error(`Unsupported DATABASE_URL: ${url}`);
}
