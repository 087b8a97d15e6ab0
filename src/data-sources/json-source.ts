import fsp from "fs/promises";
import { getErrorMessage } from "../core/logging.js";

/** Raised when a bundled data file is missing or malformed. Fatal at start-up. */
export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}

/** Read and parse a JSON data file; `label` names it in error messages. */
export async function readJsonFile(filePath: string, label: string): Promise<unknown> {
  let text: string;
  try {
    text = await fsp.readFile(filePath, "utf-8");
  } catch (err) {
    throw new CatalogError(`Cannot read ${label} at ${filePath}: ${getErrorMessage(err)}`);
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new CatalogError(`${label} at ${filePath} is not valid JSON: ${getErrorMessage(err)}`);
  }
}

/** Throw one CatalogError listing every collected problem. */
export function assertNoErrors(label: string, errors: string[]): void {
  if (errors.length > 0) {
    throw new CatalogError(`Invalid ${label}:\n  - ${errors.join("\n  - ")}`);
  }
}
