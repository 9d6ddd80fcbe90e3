/**
 * Report file output
 */

import fs from "node:fs";
import path from "node:path";
import type { OutputFormat } from "../../types/config.js";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local timestamp as YYYYMMDD_HHMMSS
 */
export function fileTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Default report file name: <accountId>_inventory_<YYYYMMDD_HHMMSS>.<ext>
 */
export function defaultOutputPath(
  accountId: string,
  format: OutputFormat,
  date: Date = new Date()
): string {
  return `${accountId}_inventory_${fileTimestamp(date)}.${format}`;
}

/**
 * Write report content, creating parent directories
 *
 * @returns Absolute path of the written file
 */
export async function exportFile(content: string, filePath: string): Promise<string> {
  const absolutePath = path.resolve(filePath);

  await fs.promises.mkdir(path.dirname(absolutePath), { recursive: true });
  await fs.promises.writeFile(absolutePath, content, "utf-8");

  return absolutePath;
}
