import { Global, Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { ContentLoaderService } from './content-loader.service.js';

@Global()
@Module({
  imports: [EngineModule],
  providers: [ContentLoaderService],
  exports: [ContentLoaderService],
})
export class ContentModule {}
