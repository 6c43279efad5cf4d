import { Global, Module } from '@nestjs/common';
import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import * as schema from './schema/index.js';
import { StorageConfigService } from './storage-config.service.js';

export const DB = Symbol('DB');
export type DrizzleDB = ReturnType<typeof drizzle<typeof schema>>;

@Global()
@Module({
  providers: [
    StorageConfigService,
    {
      provide: DB,
      inject: [StorageConfigService],
      // Pool 은 첫 쿼리 때 연결한다 (memory 드라이버면 쓰이지 않음)
      useFactory: (config: StorageConfigService) => {
        const pool = new Pool({
          connectionString: config.get().databaseUrl,
        });
        return drizzle(pool, { schema });
      },
    },
  ],
  exports: [DB, StorageConfigService],
})
export class DrizzleModule {}
