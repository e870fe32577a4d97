/**
 * File I/O utilities
 */

import { mkdir, writeFile, readFile } from 'fs/promises';
import { join, dirname } from 'path';

export type FlatRow = Record<string, string | number | boolean | null>;

export async function ensureDir(dir_path: string): Promise<void> {
  await mkdir(dir_path, { recursive: true });
}

export async function writeJson(file_path: string, data: unknown): Promise<void> {
  await ensureDir(dirname(file_path));
  await writeFile(file_path, JSON.stringify(data, null, 2), 'utf-8');
}

export async function readJsonFile(file_path: string): Promise<unknown> {
  const content = await readFile(file_path, 'utf-8');
  return JSON.parse(content);
}

function csvCell(val: string | number | boolean | null | undefined): string {
  if (val === null || val === undefined) return '';
  if (typeof val === 'string' && /[",\n]/.test(val)) {
    return `"${val.replace(/"/g, '""')}"`;
  }
  return String(val);
}

/**
 * Header is the union of keys across all rows, in first-seen order.
 */
export function toCsv(rows: FlatRow[]): string {
  if (rows.length === 0) return '';

  const headers: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        headers.push(key);
      }
    }
  }

  return [
    headers.join(','),
    ...rows.map((row) => headers.map((h) => csvCell(row[h])).join(',')),
  ].join('\n');
}

export async function writeCsv(file_path: string, rows: FlatRow[]): Promise<void> {
  await ensureDir(dirname(file_path));
  await writeFile(file_path, toCsv(rows), 'utf-8');
}

export function getOutputDir(): string {
  return join(process.cwd(), 'out');
}
