import { Module } from '@nestjs/common';
import { downloadToFile } from '@/common/fs.util';
import { THUMBNAIL_DOWNLOADER, ThumbnailService } from './thumbnail.service';

@Module({
  providers: [
    { provide: THUMBNAIL_DOWNLOADER, useValue: downloadToFile },
    ThumbnailService,
  ],
  exports: [ThumbnailService],
})
export class ThumbnailModule {}
