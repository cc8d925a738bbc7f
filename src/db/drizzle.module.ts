import { Global, Inject, Logger, Module, type OnApplicationShutdown } from '@nestjs/common';
import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import * as schema from './schema/index.js';
import { EngineConfigService } from '../config/engine-config.service.js';

export const DB = Symbol('DB');
export const PG_POOL = Symbol('PG_POOL');
export type DrizzleDB = ReturnType<typeof drizzle<typeof schema>>;

@Global()
@Module({
  providers: [
    {
      provide: PG_POOL,
      inject: [EngineConfigService],
      // pg connects lazily; a missing URL surfaces on the first query
      useFactory: (config: EngineConfigService) =>
        new Pool({ connectionString: config.get().databaseUrl }),
    },
    {
      provide: DB,
      inject: [PG_POOL],
      useFactory: (pool: Pool): DrizzleDB => drizzle(pool, { schema }),
    },
  ],
  exports: [DB],
})
export class DrizzleModule implements OnApplicationShutdown {
  private readonly logger = new Logger(DrizzleModule.name);

  constructor(@Inject(PG_POOL) private readonly pool: Pool) {}

  async onApplicationShutdown() {
    await this.pool.end();
    this.logger.log('Postgres pool closed');
  }
}
