import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { ArsenalController } from './arsenal.controller.js';
import { ArsenalService } from './arsenal.service.js';

@Module({
  imports: [EngineModule],
  controllers: [ArsenalController],
  providers: [ArsenalService],
  exports: [ArsenalService],
})
export class ArsenalModule {}
