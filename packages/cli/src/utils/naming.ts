/**
 * Naming utilities
 *
 * Accent normalization, word splitting and case conversion. Every name the
 * compiler derives (synthetic model names, method names, target identifiers)
 * goes through a single NamingEngine so one run applies one split policy.
 */

/**
 * Word split policy
 *
 * - "acronym" - "XMLHttpRequest" -> ["XML", "Http", "Request"]
 * - "lower-upper" - "XMLHttpRequest" -> ["XMLHttp", "Request"]
 */
export type WordSplitPolicy = "acronym" | "lower-upper";

export const wordSplitPolicies = ["acronym", "lower-upper"] as const;

const NON_ALPHANUMERIC = /[^A-Za-z0-9]+/;

/**
 * Strip accents by decomposing, dropping combining marks and recomposing
 * e.g., "café" -> "cafe", "São" -> "Sao"
 */
export function removeAccents(str: string): string {
  return str
    .normalize("NFD")
    .replace(/\p{Mn}/gu, "")
    .normalize("NFC");
}

function isUpper(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "A" && ch <= "Z";
}

function isLower(ch: string | undefined): boolean {
  return ch !== undefined && ch >= "a" && ch <= "z";
}

/**
 * Split a single alphanumeric run on camelCase / PascalCase boundaries
 */
export function splitCamelCase(
  run: string,
  policy: WordSplitPolicy = "acronym",
): string[] {
  const words: string[] = [];
  const chars = [...run];
  let current = "";

  for (let i = 0; i < chars.length; i++) {
    const ch = chars[i] ?? "";
    let startsWord = false;

    if (i > 0 && isUpper(ch)) {
      const prev = chars[i - 1];
      if (!isUpper(prev)) {
        startsWord = true;
      } else if (policy === "acronym" && isLower(chars[i + 1])) {
        // "XMLHttp" -> "XML", "Http"
        startsWord = true;
      }
    }

    if (startsWord && current.length > 0) {
      words.push(current);
      current = "";
    }
    current += ch;
  }

  if (current.length > 0) {
    words.push(current);
  }

  return words;
}

/**
 * Split a string into words, handling camelCase, PascalCase, snake_case,
 * kebab-case and free text
 */
export function splitWords(
  str: string,
  policy: WordSplitPolicy = "acronym",
): string[] {
  const trimmed = removeAccents(str.trim());
  if (!trimmed) return [];

  return trimmed
    .split(NON_ALPHANUMERIC)
    .filter((run) => run.length > 0)
    .flatMap((run) => splitCamelCase(run, policy));
}

function capitalizeWord(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Convert a string to PascalCase
 */
export function toPascalCase(
  str: string,
  policy: WordSplitPolicy = "acronym",
): string {
  return splitWords(str, policy).map(capitalizeWord).join("");
}

/**
 * Convert a string to camelCase
 */
export function toCamelCase(
  str: string,
  policy: WordSplitPolicy = "acronym",
): string {
  const pascal = toPascalCase(str, policy);
  return pascal.charAt(0).toLowerCase() + pascal.slice(1);
}

/**
 * Convert a string to snake_case
 */
export function toSnakeCase(
  str: string,
  policy: WordSplitPolicy = "acronym",
): string {
  return splitWords(str, policy)
    .map((word) => word.toLowerCase())
    .join("_");
}

/**
 * Convert a string to kebab-case
 */
export function toKebabCase(
  str: string,
  policy: WordSplitPolicy = "acronym",
): string {
  return splitWords(str, policy)
    .map((word) => word.toLowerCase())
    .join("-");
}

// ============================================================================
// Naming Engine
// ============================================================================

/**
 * Case converters bound to one word split policy
 */
export interface NamingEngine {
  readonly policy: WordSplitPolicy;
  splitWords(str: string): string[];
  toPascalCase(str: string): string;
  toCamelCase(str: string): string;
  toSnakeCase(str: string): string;
  toKebabCase(str: string): string;
}

/**
 * Create a naming engine for one generation run
 */
export function createNamingEngine(
  policy: WordSplitPolicy = "acronym",
): NamingEngine {
  return {
    policy,
    splitWords: (str) => splitWords(str, policy),
    toPascalCase: (str) => toPascalCase(str, policy),
    toCamelCase: (str) => toCamelCase(str, policy),
    toSnakeCase: (str) => toSnakeCase(str, policy),
    toKebabCase: (str) => toKebabCase(str, policy),
  };
}

// ============================================================================
// Property Naming Utilities
// ============================================================================

/**
 * Check if a property name is a valid JavaScript identifier
 * If not, it needs to be quoted in object literals
 */
export function isValidIdentifier(name: string): boolean {
  return /^[a-zA-Z_$][a-zA-Z0-9_$]*$/.test(name);
}

/**
 * Get a safe property name for use in object literals
 * Quotes the name if it's not a valid identifier
 */
export function getSafePropertyName(name: string): string {
  return isValidIdentifier(name) ? name : JSON.stringify(name);
}
