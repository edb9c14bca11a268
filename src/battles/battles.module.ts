import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { BattlesController } from './battles.controller.js';
import { BattlesService } from './battles.service.js';

@Module({
  imports: [EngineModule],
  controllers: [BattlesController],
  providers: [BattlesService],
})
export class BattlesModule {}
