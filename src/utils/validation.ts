/**
 * Validation utilities for input sanitization
 */

import { z } from "zod";
import { resolve, relative, isAbsolute, sep } from "path";
import { isJsonObject, setOwnProperty } from "./json-parser.js";
import type { TranslatedItems } from "./xcstrings-parser.js";

const TRANSLATIONS_ROOT_ERROR =
  "Translations file must be a JSON object mapping keys to translated strings";

/**
 * Zod schema for one translated value
 */
export const translatedTextSchema = z.string();

/**
 * Parse translated-items content: a flat key -> text map.
 * Malformed JSON and non-string values throw; they are not recoverable here.
 * Every key is kept as an own property, "__proto__" included.
 */
export function parseTranslatedItems(content: string): TranslatedItems {
  const data: unknown = JSON.parse(content);

  if (!isJsonObject(data)) {
    throw new Error(TRANSLATIONS_ROOT_ERROR);
  }

  const items: TranslatedItems = {};
  for (const [key, value] of Object.entries(data)) {
    const text = translatedTextSchema.safeParse(value);
    if (!text.success) {
      throw new Error(`Translation for key '${key}' must be a string`);
    }
    setOwnProperty(items, key, text.data);
  }

  return items;
}

/**
 * Validate that a path is within the project directory
 * Prevents path traversal attacks
 */
export function isPathWithinProject(
  filePath: string,
  projectPath: string
): boolean {
  const resolvedProject = resolve(projectPath);
  const resolvedFile = resolve(projectPath, filePath);
  const rel = relative(resolvedProject, resolvedFile);

  return (
    rel === "" ||
    (rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel))
  );
}

/**
 * Get a safe file path within the project directory
 * Returns null if path would escape project directory
 */
export function getSafeFilePath(
  filePath: string,
  projectPath: string
): string | null {
  if (!isPathWithinProject(filePath, projectPath)) {
    return null;
  }

  return resolve(projectPath, filePath);
}
