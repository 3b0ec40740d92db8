/**
 * String Catalog (.xcstrings) file handling
 *
 * String Catalogs are JSON-based localization files introduced in Xcode 15.
 * Key characteristics:
 * - Single file contains ALL languages
 * - JSON structure with sourceLanguage, version, and strings
 * - Each string entry can have localizations for multiple languages
 * - Supports metadata like extractionState and comments
 *
 * Lookups never throw on entry shape: an absent or mis-shaped field reads as
 * its default. Fields this module does not touch are written back as read.
 */

import { isJsonObject, setOwnProperty } from "./json-parser.js";
import {
  scanMemberKeys,
  sortBySourceOrder,
  stringifyWithKeyOrder,
} from "./format-preserve.js";

/**
 * The only state that counts as a finished translation.
 * Xcode also writes "needs_review", "new" and "stale"; anything other than
 * this value is treated as untranslated.
 */
export const TRANSLATED_STATE = "translated";

/**
 * String unit - the actual translated value
 */
export interface StringUnit {
  state: string;
  value: string;
}

/**
 * Localization entry for a specific language
 */
export interface XCLocalization {
  stringUnit?: StringUnit;
  /** Variations for plurals, device-specific strings, etc. */
  variations?: Record<string, unknown>;
  [field: string]: unknown;
}

/**
 * Entry for a single string key
 */
export interface XCStringEntry {
  /** Manual, migrated, stale, etc. */
  extractionState?: string;
  /** Developer comment/description */
  comment?: string;
  /** Localizations keyed by language code */
  localizations?: Record<string, XCLocalization>;
  [field: string]: unknown;
}

/**
 * Root of an .xcstrings document as read from disk.
 * Only `strings` is interpreted; `sourceLanguage`, `version` and any other
 * fields are preserved on write.
 */
export type XCStringsCatalog = Record<string, unknown>;

export interface MissingTranslation {
  /** The catalog key, which is usually the source text itself */
  source: string;
  comment: string;
}

/** Report of untranslated entries, keyed like the catalog */
export type MissingTranslationsReport = Record<string, MissingTranslation>;

/** Translated text keyed by catalog key */
export type TranslatedItems = Record<string, string>;

export interface ApplyTranslationsResult {
  catalog: XCStringsCatalog;
  /** Keys written, in input order */
  updatedKeys: string[];
  /** Keys with no entry in the catalog */
  unknownKeys: string[];
  /** Keys whose catalog entry is not a JSON object and was left alone */
  invalidKeys: string[];
}

/**
 * Why an entry counts as missing for a locale:
 * - "no_localization": no record for the locale at all
 * - "no_state": a record exists but carries no string state
 * - any other string: the state Xcode recorded (e.g. "needs_review")
 */
export type MissingReason = string;

export interface TranslationStatusSummary {
  locale: string;
  totalKeys: number;
  translatedCount: number;
  missingCount: number;
  missingByReason: Record<string, number>;
}

/**
 * Parse .xcstrings content
 *
 * Malformed JSON is not caught here; the SyntaxError reaches the caller.
 *
 * @param content Raw JSON content
 * @returns The catalog document
 * @throws Error if the document root is not a JSON object
 */
export function parseXCStringsContent(content: string): XCStringsCatalog {
  const data: unknown = JSON.parse(content);

  if (!isJsonObject(data)) {
    throw new Error("Invalid .xcstrings file: root must be a JSON object");
  }

  return data;
}

/**
 * Read the order of the catalog's `strings` keys from its raw text
 *
 * @returns Keys in file order, or [] when there is no `strings` object
 */
export function readCatalogKeyOrder(content: string): string[] {
  return scanMemberKeys(content, ["strings"]) ?? [];
}

/**
 * Get the `strings` mapping of a catalog.
 *
 * A missing or non-object `strings` reads as an empty mapping that is not
 * attached to the catalog, so callers never add the field to a document
 * that lacked it.
 */
export function getCatalogStrings(
  catalog: XCStringsCatalog
): Record<string, unknown> {
  const strings = catalog.strings;
  return isJsonObject(strings) ? strings : {};
}

/**
 * Get the localization record of an entry for a locale
 *
 * @returns The record, or null when the entry, its localizations or the
 * locale slot is absent or not an object
 */
export function getLocalization(
  entry: unknown,
  locale: string
): Record<string, unknown> | null {
  if (!isJsonObject(entry)) return null;

  const localizations = entry.localizations;
  if (!isJsonObject(localizations)) return null;

  const localization = localizations[locale];
  return isJsonObject(localization) ? localization : null;
}

/**
 * Get the `stringUnit.state` of an entry for a locale
 *
 * @returns The state, or null when any level of the lookup is absent
 */
export function getStringUnitState(
  entry: unknown,
  locale: string
): string | null {
  const localization = getLocalization(entry, locale);
  if (!localization) return null;

  const stringUnit = localization.stringUnit;
  if (!isJsonObject(stringUnit)) return null;

  const state = stringUnit.state;
  return typeof state === "string" ? state : null;
}

/**
 * Check whether an entry lacks a finished translation for a locale.
 * Total over every entry shape: only an exact "translated" state is a hit.
 */
export function isTranslationMissing(entry: unknown, locale: string): boolean {
  return getStringUnitState(entry, locale) !== TRANSLATED_STATE;
}

/**
 * Classify a missing entry
 */
export function getMissingReason(
  entry: unknown,
  locale: string
): MissingReason {
  if (!getLocalization(entry, locale)) return "no_localization";
  return getStringUnitState(entry, locale) ?? "no_state";
}

/**
 * Get the developer comment of an entry, or "" if it has none
 */
export function getEntryComment(entry: unknown): string {
  if (!isJsonObject(entry)) return "";
  return typeof entry.comment === "string" ? entry.comment : "";
}

/**
 * Collect every entry whose translation for a locale is missing
 *
 * @param catalog Parsed catalog
 * @param locale Target language code
 * @param keyOrder Catalog keys in file order, from `readCatalogKeyOrder`
 * @returns Report in catalog order
 */
export function collectMissingTranslations(
  catalog: XCStringsCatalog,
  locale: string,
  keyOrder: readonly string[] = []
): MissingTranslationsReport {
  const strings = getCatalogStrings(catalog);
  const report: MissingTranslationsReport = {};

  for (const key of sortBySourceOrder(Object.keys(strings), keyOrder)) {
    const entry = strings[key];
    if (isTranslationMissing(entry, locale)) {
      setOwnProperty(report, key, {
        source: key,
        comment: getEntryComment(entry),
      });
    }
  }

  return report;
}

/**
 * Write translated values into a catalog for a specific locale
 *
 * - Only keys already in the catalog are written; no entry is created
 * - Other locales and other entry fields are preserved
 * - The locale slot is replaced with a "translated" string unit
 *
 * @param catalog Original catalog (not mutated)
 * @param locale Target language code
 * @param translations Translated text keyed by catalog key
 * @param translationOrder Translation keys in file order
 */
export function applyTranslations(
  catalog: XCStringsCatalog,
  locale: string,
  translations: TranslatedItems,
  translationOrder: readonly string[] = []
): ApplyTranslationsResult {
  // Deep clone to avoid mutating original
  const result: XCStringsCatalog = JSON.parse(JSON.stringify(catalog));
  const strings = getCatalogStrings(result);

  const updatedKeys: string[] = [];
  const unknownKeys: string[] = [];
  const invalidKeys: string[] = [];

  for (const key of sortBySourceOrder(Object.keys(translations), translationOrder)) {
    const value = translations[key];
    if (!Object.hasOwn(strings, key)) {
      unknownKeys.push(key);
      continue;
    }

    const entry = strings[key];
    if (!isJsonObject(entry)) {
      invalidKeys.push(key);
      continue;
    }

    // Ensure localizations object exists, keeping any other locales
    const localizations: Record<string, unknown> = isJsonObject(
      entry.localizations
    )
      ? entry.localizations
      : {};

    const localization: XCLocalization = {
      stringUnit: {
        state: TRANSLATED_STATE,
        value,
      },
    };
    setOwnProperty(localizations, locale, localization);
    entry.localizations = localizations;
    updatedKeys.push(key);
  }

  return { catalog: result, updatedKeys, unknownKeys, invalidKeys };
}

/**
 * Summarize how far a locale is translated
 */
export function summarizeTranslationStatus(
  catalog: XCStringsCatalog,
  locale: string
): TranslationStatusSummary {
  const strings = getCatalogStrings(catalog);
  const missingByReason = new Map<string, number>();
  let totalKeys = 0;
  let missingCount = 0;

  for (const entry of Object.values(strings)) {
    totalKeys++;
    if (!isTranslationMissing(entry, locale)) continue;

    missingCount++;
    const reason = getMissingReason(entry, locale);
    missingByReason.set(reason, (missingByReason.get(reason) ?? 0) + 1);
  }

  return {
    locale,
    totalKeys,
    translatedCount: totalKeys - missingCount,
    missingCount,
    missingByReason: Object.fromEntries(missingByReason),
  };
}

/**
 * Serialize a catalog with the formatting Xcode uses:
 * 2-space indentation, non-ASCII characters written as-is.
 * `strings` keys follow `keyOrder`; other objects keep property order.
 */
export function reconstructXCStringsContent(
  catalog: XCStringsCatalog,
  keyOrder: readonly string[] = []
): string {
  return (
    stringifyWithKeyOrder(catalog, (path, keys) =>
      path.length === 1 && path[0] === "strings"
        ? sortBySourceOrder(keys, keyOrder)
        : keys
    ) + "\n"
  );
}

/**
 * Serialize a missing-translations report in the same format,
 * its keys following `keyOrder`
 */
export function reconstructReportContent(
  report: MissingTranslationsReport,
  keyOrder: readonly string[] = []
): string {
  return (
    stringifyWithKeyOrder(report, (path, keys) =>
      path.length === 0 ? sortBySourceOrder(keys, keyOrder) : keys
    ) + "\n"
  );
}
