import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { Injectable, Logger, LogLevel } from '@nestjs/common';

const LOG_LEVELS: Record<string, LogLevel[]> = {
  error: ['error', 'fatal'],
  warn: ['error', 'fatal', 'warn'],
  info: ['error', 'fatal', 'warn', 'log'],
  debug: ['error', 'fatal', 'warn', 'log', 'debug'],
};

@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly envConfig: Record<string, string>;

  constructor() {
    const envFile = process.env.NODE_ENV === 'production'
      ? '.env.production'
      : '.env.development';

    let fileConfig: Record<string, string> = {};
    if (fs.existsSync(envFile)) {
      fileConfig = dotenv.parse(fs.readFileSync(envFile));
    } else {
      this.logger.warn(`${envFile} not found, using process.env`);
    }

    // Variables set on the process override the file.
    const processConfig = Object.fromEntries(
      Object.entries(process.env).filter(
        (entry): entry is [string, string] => entry[1] !== undefined,
      ),
    );
    this.envConfig = { ...fileConfig, ...processConfig };
  }

  get(key: string): string {
    const value = this.envConfig[key];
    if (value === undefined) {
      throw new Error(`Configuration error: Missing required environment variable ${key}`);
    }
    return value;
  }

  getOrDefault(key: string, fallback: string): string {
    const value = this.envConfig[key];
    return value === undefined || value === '' ? fallback : value;
  }

  getNumber(key: string, fallback: number): number {
    const parsed = Number.parseInt(this.getOrDefault(key, String(fallback)), 10);
    return Number.isNaN(parsed) ? fallback : parsed;
  }

  getBoolean(key: string, fallback: boolean): boolean {
    const value = this.getOrDefault(key, String(fallback)).toLowerCase();
    return value === 'true' || value === '1';
  }

  /** Nest log levels enabled by LOG_LEVEL (error | warn | info | debug). */
  logLevels(): LogLevel[] {
    const level = this.getOrDefault('LOG_LEVEL', 'debug').toLowerCase();
    return LOG_LEVELS[level] ?? LOG_LEVELS.debug;
  }
}
