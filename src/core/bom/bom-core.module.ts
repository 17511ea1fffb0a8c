import { Module } from '@nestjs/common';
import { APP_CONFIG, ensureRuntimeEnvLoaded, readAppConfig } from '../../runtime-env';
import { BomWorkspaceStoreService } from './bom-workspace-store.service';

@Module({
  providers: [
    {
      provide: APP_CONFIG,
      useFactory: () => {
        ensureRuntimeEnvLoaded();
        return readAppConfig();
      },
    },
    BomWorkspaceStoreService,
  ],
  exports: [APP_CONFIG, BomWorkspaceStoreService],
})
export class BomCoreModule {}
