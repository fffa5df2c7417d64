import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { Injectable } from '@nestjs/common';

@Injectable()
export class ConfigService {
  private readonly envConfig: Record<string, string>;

  constructor() {
    const envFile = process.env.NODE_ENV === 'production'
      ? '.env.production'
      : '.env.development';

    if (fs.existsSync(envFile)) {
      this.envConfig = { ...ConfigService.processEnv(), ...dotenv.parse(fs.readFileSync(envFile)) };
    } else {
      console.warn(`Failed to load ${envFile}, using process.env`);
      this.envConfig = ConfigService.processEnv();
    }
  }

  private static processEnv(): Record<string, string> {
    return Object.fromEntries(
      Object.entries(process.env).filter((entry): entry is [string, string] => entry[1] !== undefined),
    );
  }

  get(key: string): string {
    const value = this.envConfig[key];
    if (value === undefined) {
      throw new Error(`Configuration error: Missing required environment variable ${key}`);
    }
    return value;
  }

  getOrDefault(key: string, fallback: string): string {
    return this.envConfig[key] ?? fallback;
  }

  getNumber(key: string, fallback: number): number {
    const raw = this.envConfig[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = Number(raw);
    if (Number.isNaN(parsed)) {
      throw new Error(`Configuration error: ${key} must be numeric, got "${raw}"`);
    }
    return parsed;
  }
}
