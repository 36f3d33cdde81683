import { Module } from '@nestjs/common';
import { SamplingService } from './sampling.service';

@Module({
  providers: [SamplingService],
  exports: [SamplingService],
})
export class SamplingModule {}
