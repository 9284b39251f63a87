import { flattenDocument } from "../flatten/flatten.js";
import { buildPromptedInput } from "../prompt/clinical.js";
import { readJsonFile } from "./input.js";

export interface FlattenOptions {
  input: string;
  withPrompt: boolean;
  now?: Date;
}

export async function runFlatten(options: FlattenOptions): Promise<string> {
  const data = await readJsonFile(options.input);
  const flattened = flattenDocument(data);
  return options.withPrompt ? buildPromptedInput(flattened, { now: options.now }) : flattened;
}
