import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatasetWorkspace } from './dataset.workspace';
import { RotationService } from './rotation.service';
import { DvcVersionTool, VERSION_TOOL } from './version-tool';

@Module({
  imports: [ConfigModule],
  providers: [
    DatasetWorkspace,
    DvcVersionTool,
    { provide: VERSION_TOOL, useExisting: DvcVersionTool },
    RotationService,
  ],
  exports: [DatasetWorkspace, RotationService],
})
export class DatasetModule {}
