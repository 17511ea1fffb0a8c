import { Module, ValidationPipe } from '@nestjs/common';
import { APP_FILTER, APP_PIPE } from '@nestjs/core';
import { BomErrorFilter } from './common/bom-error.filter';
import { BomsModule } from './modules/boms/boms.module';
import { HealthModule } from './modules/health/health.module';

@Module({
  imports: [HealthModule, BomsModule],
  providers: [
    {
      provide: APP_PIPE,
      useValue: new ValidationPipe({ whitelist: true, transform: true }),
    },
    {
      provide: APP_FILTER,
      useClass: BomErrorFilter,
    },
  ],
})
export class AppModule {}
