/**
 * Environment file (.env) loading service.
 *
 * Shared utility for reading configuration from a .env file:
 * - Parse raw .env content into key-value records
 * - Read .env from disk with a configurable path
 * - Merge the file under the process environment (process env wins)
 */

import { readFile } from "fs/promises";
import { join } from "path";

// ============================================================================
// TYPES
// ============================================================================

/** Key-value record representing parsed .env contents */
export type EnvRecord = Record<string, string>;

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Read and parse a .env file from disk.
 * Returns an empty record if the file does not exist.
 *
 * @param envPath - Absolute path to the .env file. Defaults to process.cwd()/.env
 * @returns Parsed key-value pairs from the .env file
 */
export async function readEnv(envPath?: string): Promise<EnvRecord> {
  const filePath = envPath ?? join(process.cwd(), ".env");
  const content = await readFile(filePath, "utf-8").catch((err: NodeJS.ErrnoException) => {
    if (err.code === "ENOENT") return "";
    throw err;
  });
  return parseEnvFile(content);
}

/**
 * Load the effective environment: the .env file overlaid with every defined
 * variable from `processEnv`.
 *
 * @param envPath - Absolute path to the .env file. Defaults to process.cwd()/.env
 * @param processEnv - Variables that take precedence over the file
 * @returns Merged key-value pairs
 */
export async function loadEnv(
  envPath?: string,
  processEnv: NodeJS.ProcessEnv = process.env,
): Promise<EnvRecord> {
  const fromFile = await readEnv(envPath);
  return mergeEnv(fromFile, processEnv);
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Parse a .env file string into a key-value record.
 * Handles lines in the format KEY=VALUE or `export KEY=VALUE`, ignores empty
 * lines and comments, and strips one pair of matching surrounding quotes.
 * Keeps empty values (KEY= produces { KEY: "" }).
 *
 * @param content - Raw .env file content
 * @returns Parsed key-value pairs
 */
export function parseEnvFile(content: string): EnvRecord {
  const result: EnvRecord = {};
  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const assignment = trimmed.startsWith("export ") ? trimmed.slice("export ".length) : trimmed;
    const eqIndex = assignment.indexOf("=");
    if (eqIndex === -1) continue;

    const key = assignment.slice(0, eqIndex).trim();
    if (!key) continue;
    result[key] = unquote(assignment.slice(eqIndex + 1).trim());
  }
  return result;
}

/**
 * Overlay defined process variables on top of file values.
 *
 * @param fromFile - Values parsed from .env
 * @param processEnv - Process environment
 * @returns A new merged record
 */
export function mergeEnv(fromFile: EnvRecord, processEnv: NodeJS.ProcessEnv): EnvRecord {
  const merged: EnvRecord = { ...fromFile };
  for (const [key, value] of Object.entries(processEnv)) {
    if (value !== undefined) merged[key] = value;
  }
  return merged;
}

/**
 * Strip one pair of matching single or double quotes.
 *
 * @param value - Raw value text
 * @returns The value without its surrounding quotes
 */
function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return value.slice(1, -1);
    }
  }
  return value;
}
