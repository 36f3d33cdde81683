import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import * as path from 'path';
import sharp from 'sharp';
import { downloadToFile, ensureDir, pathExists } from '@/common/fs.util';
import { VideoRecord } from '@/types/sample';

export const THUMBNAIL_DOWNLOADER = Symbol('THUMBNAIL_DOWNLOADER');

export type ThumbnailDownloader = (
  url: string,
  destPath: string,
) => Promise<void>;

export type DownloadSummary = {
  saved: number;
  existing: number;
  missingUrl: number;
  failed: number;
};

export type Preview = { data: Buffer; width: number; height: number };

/** Longest side of tracking previews */
export const PREVIEW_BOX = 400;

export function thumbnailFileName(videoId: string): string {
  return `${videoId}.jpg`;
}

@Injectable()
export class ThumbnailService {
  private readonly logger = new Logger(ThumbnailService.name);

  constructor(
    @Optional()
    @Inject(THUMBNAIL_DOWNLOADER)
    private readonly download: ThumbnailDownloader = downloadToFile,
  ) {}

  /**
   * Saves each record's thumbnail as `<video_id>.jpg` in `outDir`, one at a
   * time. Files already present are kept; a failed download is skipped.
   */
  async downloadAll(
    records: VideoRecord[],
    outDir: string,
  ): Promise<DownloadSummary> {
    ensureDir(outDir);
    const summary: DownloadSummary = {
      saved: 0,
      existing: 0,
      missingUrl: 0,
      failed: 0,
    };
    this.logger.log(`Downloading ${records.length} thumbnails...`);

    for (const r of records) {
      if (!r.thumbnailUrl) {
        summary.missingUrl++;
        continue;
      }
      const dest = path.join(outDir, thumbnailFileName(r.videoId));
      if (await pathExists(dest)) {
        summary.existing++;
        continue;
      }
      try {
        await this.download(r.thumbnailUrl, dest);
        summary.saved++;
      } catch (e) {
        summary.failed++;
        this.logger.warn(`Failed ${r.videoId}: ${String(e)}`);
      }
    }
    return summary;
  }

  /**
   * RGB JPEG fitted inside a 400x400 box, aspect kept; the source file is
   * untouched.
   */
  async renderPreview(filePath: string): Promise<Preview> {
    const { data, info } = await sharp(filePath)
      .toColourspace('srgb')
      .removeAlpha()
      .resize(PREVIEW_BOX, PREVIEW_BOX, {
        fit: 'inside',
        withoutEnlargement: true,
      })
      .jpeg()
      .toBuffer({ resolveWithObject: true });
    return { data, width: info.width, height: info.height };
  }
}
