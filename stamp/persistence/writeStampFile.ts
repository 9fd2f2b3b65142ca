import fs from "node:fs/promises";
import path from "node:path";
import { OutputError } from "../../lib/errors.js";

/**
 * Persist an SVG stamp.
 *
 * Writes to a sibling temp file and renames it into place, so a failed write
 * never leaves a partial stamp at the target path.
 */
export async function writeStampFile(outputPath: string, svg: string): Promise<string> {
  const target = path.resolve(outputPath);
  const tmp = `${target}.${process.pid}.tmp`;

  let tmpStarted = false;
  try {
    await fs.mkdir(path.dirname(target), { recursive: true });
    tmpStarted = true;
    await fs.writeFile(tmp, svg, "utf-8");
    await fs.rename(tmp, target);
  } catch (err) {
    let message = err instanceof Error ? err.message : String(err);
    if (tmpStarted) {
      try {
        await fs.rm(tmp, { force: true });
      } catch (cleanupErr) {
        const detail = cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr);
        message += `; temp file ${tmp} was not removed (${detail})`;
      }
    }
    throw new OutputError(message, target, { cause: err });
  }

  return target;
}
