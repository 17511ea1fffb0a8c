import { Module } from '@nestjs/common';
import { BomCoreModule } from '../../core/bom/bom-core.module';
import { BomsController } from './boms.controller';
import { BomsService } from './boms.service';

@Module({
  imports: [BomCoreModule],
  controllers: [BomsController],
  providers: [BomsService],
})
export class BomsModule {}
