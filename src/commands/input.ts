import { readFile } from "node:fs/promises";
import { InvalidInputError } from "../errors.js";
import { parseJsonDocument, type JsonDocument } from "../flatten/flatten.js";

export async function readJsonFile(path: string): Promise<JsonDocument> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new InvalidInputError(`Cannot read ${path}: ${detail}`, { cause: error });
  }
  return parseJsonDocument(text, path);
}
