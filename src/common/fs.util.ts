import * as fs from 'fs';
import * as path from 'path';
import axios from 'axios';

export type CsvValue = string | number | boolean | null | undefined;

export function ensureDir(p: string) {
  if (!fs.existsSync(p)) fs.mkdirSync(p, { recursive: true });
}

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.promises.access(p);
    return true;
  } catch {
    return false;
  }
}

export async function downloadToFile(
  url: string,
  destPath: string,
  timeoutMs = 10_000,
): Promise<void> {
  ensureDir(path.dirname(destPath));
  const resp = await axios.get<ArrayBuffer>(url, {
    responseType: 'arraybuffer',
    timeout: timeoutMs,
  });
  await fs.promises.writeFile(destPath, Buffer.from(resp.data));
}

export async function writeJsonl(filePath: string, records: unknown[]) {
  ensureDir(path.dirname(filePath));
  const lines = records.map((r) => JSON.stringify(r));
  await fs.promises.writeFile(filePath, lines.join('\n') + '\n', 'utf8');
}

export function csvEscape(v: CsvValue): string {
  if (v === null || v === undefined) return '';
  const s = String(v);
  if (/[",\r\n]/.test(s)) return `"${s.replace(/"/g, '""')}"`;
  return s;
}

export function toCsvLine(values: CsvValue[]): string {
  return values.map(csvEscape).join(',');
}

/** Splits one header line; header names never need quoting here. */
export function parseCsvHeader(line: string): string[] {
  return line
    .replace(/\r$/, '')
    .split(',')
    .map((h) => h.trim())
    .filter(Boolean);
}

/** Number of data rows after the header; newlines inside quotes don't count. */
export function countCsvRecords(text: string): number {
  let lines = 0;
  let inQuotes = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '"') inQuotes = !inQuotes;
    else if (ch === '\n' && !inQuotes) lines++;
  }
  // last line without trailing newline
  if (text.length > 0 && !text.endsWith('\n')) lines++;
  return Math.max(0, lines - 1);
}
