import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { StoreLogger } from "../config";
import { emptyDocument, repairDocument, type LoadedDocument } from "./schema";

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export function parseDocument(text: string, logger: StoreLogger): LoadedDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    // Unreadable JSON is replaced by an empty document on purpose.
    logger.warn("Budget file is not valid JSON; starting from an empty document.", error);
    return emptyDocument();
  }
  return repairDocument(raw, logger);
}

function serializeDocument(document: LoadedDocument): string {
  const months = { ...document.preserved, ...document.months };
  return JSON.stringify({ months }, null, 2);
}

export async function saveDocument(
  filePath: string,
  document: LoadedDocument,
): Promise<void> {
  const tmpPath = `${filePath}.tmp`;
  await mkdir(dirname(filePath), { recursive: true });
  try {
    await writeFile(tmpPath, serializeDocument(document), "utf-8");
    await rename(tmpPath, filePath);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

export async function loadDocument(
  filePath: string,
  logger: StoreLogger,
): Promise<LoadedDocument> {
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
    const created = emptyDocument();
    await saveDocument(filePath, created);
    logger.info(`Created budget file at ${filePath}.`);
    return created;
  }
  return parseDocument(text, logger);
}
