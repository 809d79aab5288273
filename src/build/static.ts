import { cp, rm, stat } from "node:fs/promises";

/**
 * Replace `destination` with a full copy of `source`.
 * A missing source leaves the destination untouched and returns false.
 */
export async function copyStaticTree(source: string, destination: string): Promise<boolean> {
  try {
    if (!(await stat(source)).isDirectory()) return false;
  } catch {
    return false;
  }

  await rm(destination, { recursive: true, force: true });
  await cp(source, destination, { recursive: true });
  return true;
}
