import { readFile } from "node:fs/promises";
import path from "node:path";

export async function loadFixtureBytes(relativeOrAbsolutePath: string): Promise<Uint8Array | null> {
  try {
    const resolved = path.isAbsolute(relativeOrAbsolutePath)
      ? relativeOrAbsolutePath
      : path.join(process.cwd(), relativeOrAbsolutePath);
    return new Uint8Array(await readFile(resolved));
  } catch (error) {
    console.warn(`Unable to load fixture ${relativeOrAbsolutePath}`, error);
    return null;
  }
}
