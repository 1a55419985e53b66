import { promises as fs } from "fs";

function isJsonLine(line: string): boolean {
  try {
    JSON.parse(line);
    return true;
  } catch {
    return false;
  }
}

/** Blank lines are ignored; every other line must parse as JSON. */
export function isValidJsonl(content: string): boolean {
  return content
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .every(isJsonLine);
}

export async function validateJsonlFile(filePath: string): Promise<boolean> {
  const content = await fs.readFile(filePath, "utf8");
  return isValidJsonl(content);
}
