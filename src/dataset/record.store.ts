import * as fs from 'fs';
import * as path from 'path';
import {
  countCsvRecords,
  CsvValue,
  ensureDir,
  parseCsvHeader,
  pathExists,
  toCsvLine,
} from '@/common/fs.util';
import { DatasetRow } from '@/types/sample';

/** Column header -> row field, in the order a new file is written. */
export const RECORD_COLUMNS: ReadonlyArray<
  readonly [string, keyof DatasetRow]
> = [
  ['video_id', 'videoId'],
  ['title', 'title'],
  ['category_id', 'categoryId'],
  ['category_name', 'categoryName'],
  ['views', 'views'],
  ['likes', 'likes'],
  ['comments', 'comments'],
  ['channel_id', 'channelId'],
  ['channel_subscribers', 'channelSubscribers'],
  ['channel_total_views', 'channelTotalViews'],
  ['channel_video_count', 'channelVideoCount'],
  ['tags', 'tags'],
  ['description_len', 'descriptionLen'],
  ['duration_seconds', 'durationSeconds'],
  ['definition', 'definition'],
  ['language', 'language'],
  ['published_at', 'publishedAt'],
  ['captured_at', 'capturedAt'],
  ['video_url', 'videoUrl'],
  ['thumbnail_url', 'thumbnailUrl'],
  ['batch_version', 'batchVersion'],
];

const FIELD_BY_HEADER = new Map<string, keyof DatasetRow>(
  RECORD_COLUMNS.map(([header, key]) => [header, key]),
);

export function rowToColumns(row: DatasetRow): Record<string, CsvValue> {
  const out: Record<string, CsvValue> = {};
  for (const [header, key] of RECORD_COLUMNS) out[header] = row[key];
  return out;
}

/**
 * Append-only CSV table. The header is written once when the file is
 * created; later appends follow whatever header the file already has, and
 * columns the file doesn't know are dropped.
 */
export class CsvRecordStore {
  constructor(readonly filePath: string) {}

  private async readHeader(): Promise<string[] | null> {
    if (!(await pathExists(this.filePath))) return null;
    const handle = await fs.promises.open(this.filePath, 'r');
    try {
      const buf = Buffer.alloc(8192);
      const { bytesRead } = await handle.read(buf, 0, buf.length, 0);
      const text = buf.subarray(0, bytesRead).toString('utf8');
      const nl = text.indexOf('\n');
      const header = parseCsvHeader(nl === -1 ? text : text.slice(0, nl));
      return header.length ? header : null;
    } finally {
      await handle.close();
    }
  }

  async append(rows: DatasetRow[]): Promise<number> {
    if (!rows.length) return 0;
    ensureDir(path.dirname(this.filePath));

    const existing = await this.readHeader();
    const header = existing ?? RECORD_COLUMNS.map(([h]) => h);

    const lines = rows.map((row) =>
      toCsvLine(
        header.map((h) => {
          const key = FIELD_BY_HEADER.get(h);
          return key ? row[key] : '';
        }),
      ),
    );

    if (!existing) {
      await fs.promises.writeFile(
        this.filePath,
        [toCsvLine(header), ...lines].join('\n') + '\n',
        'utf8',
      );
    } else {
      await fs.promises.appendFile(
        this.filePath,
        lines.join('\n') + '\n',
        'utf8',
      );
    }
    return rows.length;
  }

  async count(): Promise<number> {
    if (!(await pathExists(this.filePath))) return 0;
    const text = await fs.promises.readFile(this.filePath, 'utf8');
    return countCsvRecords(text);
  }
}
