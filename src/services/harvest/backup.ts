/**
 * Raw XML backup of harvested records
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

const UNSAFE_FILE_NAME_CHARACTERS = /[^A-Za-z0-9._-]/g;

/**
 * `urn:nbn:fi:lb-1` -> `urn_nbn_fi_lb-1.xml`
 */
export function backupFileName(pid: string): string {
  return `${pid.replace(UNSAFE_FILE_NAME_CHARACTERS, "_")}.xml`;
}

/**
 * Write one record's XML into `directory`, creating the directory when needed.
 * Returns the written path.
 */
export async function writeBackup(
  directory: string,
  pid: string,
  xml: string
): Promise<string> {
  await mkdir(directory, { recursive: true });
  const path = join(directory, backupFileName(pid));
  await writeFile(path, xml, "utf8");
  return path;
}
