import { parseTree, printParseErrorCode, type Node, type ParseError } from "jsonc-parser";
import { InvalidInputError } from "../errors.js";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/** A parsed document; properties keep their source order and numbers their source text. */
export interface JsonDocument {
  text: string;
  root: Node;
}

// Rendered between object entries; joined with spaces it reads "a 1 , b 2".
const SEPARATOR = ",";

export function parseJsonDocument(text: string, source = "input"): JsonDocument {
  const errors: ParseError[] = [];
  const root = parseTree(text, errors, { disallowComments: true, allowTrailingComma: false });
  const [first] = errors;
  if (first) {
    throw new InvalidInputError(`Invalid JSON in ${source}: ${printParseErrorCode(first.error)} at offset ${first.offset}`);
  }
  if (!root) {
    throw new InvalidInputError(`Invalid JSON in ${source}: no value`);
  }
  return { text, root };
}

/**
 * Serializes a parsed document into one line of text for the summarization prompt.
 *
 * Objects become `key value ,` runs, arrays are flattened element by element,
 * `null` becomes `None`. A trailing separator left by the outermost entry is dropped.
 */
export function flattenDocument(document: JsonDocument): string {
  const tokens = collectTokens(document.root, document.text);
  if (tokens.length > 0 && tokens[tokens.length - 1] === SEPARATOR) {
    return tokens.slice(0, -1).join(" ");
  }
  return tokens.join(" ");
}

/** In-memory values follow JavaScript's own property order. */
export function flattenJson(value: JsonValue): string {
  return flattenDocument(parseJsonDocument(JSON.stringify(value)));
}

export function cleanString(input: string): string {
  return input
    .replace(/\\"/g, '"')
    .replace(/\\'/g, "'")
    .replace(/(?<!\\)"/g, "")
    .replace(/\r?\n/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function cleanKey(key: string): string {
  return key.replace(/\n/g, " ");
}

function collectTokens(node: Node, text: string): string[] {
  const children = node.children ?? [];
  switch (node.type) {
    case "null":
      return ["None"];
    case "boolean":
      return [node.value === true ? "True" : "False"];
    case "number":
      return [text.slice(node.offset, node.offset + node.length)];
    case "string":
      return [cleanString(String(node.value))];
    case "array":
      return children.flatMap((child) => collectTokens(child, text));
    case "object":
      return children.flatMap((property) => {
        const [key, value] = property.children ?? [];
        if (!key || !value) {
          throw new InvalidInputError(`Incomplete property at offset ${property.offset}`);
        }
        return [cleanKey(String(key.value)), ...collectTokens(value, text), SEPARATOR];
      });
    default:
      throw new InvalidInputError(`Unexpected ${node.type} node at offset ${node.offset}`);
  }
}
