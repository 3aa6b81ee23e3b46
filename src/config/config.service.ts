import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { Injectable, Logger } from '@nestjs/common';

@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly envConfig: Record<string, string>;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    const envFile = env.NODE_ENV === 'production' ? '.env.production' : '.env.development';

    if (fs.existsSync(envFile)) {
      this.envConfig = dotenv.parse(fs.readFileSync(envFile));
    } else {
      this.logger.warn(`${envFile} not found, using process.env`);
      this.envConfig = Object.fromEntries(
        Object.entries(env).filter((entry): entry is [string, string] => entry[1] !== undefined),
      );
    }
  }

  get(key: string, fallback?: string): string {
    const value = this.envConfig[key] ?? fallback;
    if (value === undefined) {
      throw new Error(`Configuration error: Missing required environment variable ${key}`);
    }
    return value;
  }

  getNumber(key: string, fallback?: number): number {
    const raw = this.get(key, fallback === undefined ? undefined : String(fallback));
    const value = Number.parseInt(raw, 10);
    if (Number.isNaN(value)) {
      throw new Error(`Configuration error: ${key} must be a number, got "${raw}"`);
    }
    return value;
  }

  getBoolean(key: string, fallback?: boolean): boolean {
    const raw = this.get(key, fallback === undefined ? undefined : String(fallback));
    return raw.toLowerCase() === 'true';
  }
}
