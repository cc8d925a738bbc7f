import { Global, Module } from '@nestjs/common';
import { JsonMoveCatalogService, MOVE_CATALOG } from './move-catalog.service.js';

@Global()
@Module({
  providers: [
    JsonMoveCatalogService,
    { provide: MOVE_CATALOG, useExisting: JsonMoveCatalogService },
  ],
  exports: [JsonMoveCatalogService, MOVE_CATALOG],
})
export class ContentModule {}
