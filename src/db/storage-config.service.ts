import { Injectable } from '@nestjs/common';
import { z } from 'zod';

export const STORAGE_DRIVER = ['memory', 'pg'] as const;
export type StorageDriver = (typeof STORAGE_DRIVER)[number];

export interface StorageConfig {
  driver: StorageDriver;
  databaseUrl: string | undefined;
}

const StorageEnvSchema = z.object({
  STORAGE_DRIVER: z.enum(STORAGE_DRIVER).default('memory'),
  DATABASE_URL: z.string().min(1).optional(),
});

@Injectable()
export class StorageConfigService {
  private readonly config: StorageConfig;

  constructor() {
    const env = StorageEnvSchema.parse(process.env);
    if (env.STORAGE_DRIVER === 'pg' && !env.DATABASE_URL) {
      throw new Error('DATABASE_URL is required when STORAGE_DRIVER=pg');
    }
    this.config = { driver: env.STORAGE_DRIVER, databaseUrl: env.DATABASE_URL };
  }

  get(): StorageConfig {
    return this.config;
  }
}
