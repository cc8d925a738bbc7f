import { Module, type DynamicModule } from '@nestjs/common';
import { ConfigModule } from './config/config.module.js';
import { DrizzleModule } from './db/drizzle.module.js';
import { ContentModule } from './content/content.module.js';
import { EngineModule } from './engine/engine.module.js';
import { BattlesModule, type BattlesModuleOptions } from './battles/battles.module.js';

@Module({})
export class AppModule {
  static forRoot(options: BattlesModuleOptions = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule,
        DrizzleModule,
        ContentModule,
        EngineModule,
        BattlesModule.forRoot(options),
      ],
    };
  }
}
