import fs from "node:fs/promises";
import type { ProvenanceStatement } from "./types.js";

export function serializeProvenance(statement: ProvenanceStatement): string {
  return JSON.stringify(statement, null, 2);
}

/**
 * Write the document to `outFile`, or print it to stdout when no file is set.
 */
export async function writeProvenance(
  statement: ProvenanceStatement,
  outFile?: string,
): Promise<void> {
  const json = serializeProvenance(statement);
  if (outFile) {
    await fs.writeFile(outFile, json, "utf8");
    return;
  }
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(json + "\n", (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}
