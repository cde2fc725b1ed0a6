/**
 * @module config-loader
 * Loads `facility.yaml`, the configuration a log adapter reads to learn
 * which facility to tag emitted messages with and which facilities an
 * ingestion pipeline accepts.
 *
 * Steps: read `.env` beside the file, parse YAML, substitute
 * `{{env.NAME}}`, validate with Zod, then resolve every facility
 * reference through the registry.
 */

import { z } from 'zod';
import yaml from 'js-yaml';
import dotenv from 'dotenv';
import fs from 'node:fs/promises';
import path from 'node:path';
import { FacilityError } from './errors.js';
import { facilityRegistry } from './facility/registry.js';
import type { Facility } from './facility/types.js';
import { resolveObjectVariables, type EnvContext } from './variable-resolver.js';

// =====================================================================
// Zod Schema
// =====================================================================

/** A facility given by label (`LOCAL0`) or numerical code (`16`). */
export const FacilityRefSchema = z
  .union([z.string(), z.number().int()])
  .describe('Facility label such as "LOCAL0", or numerical code 0-23');

export const FacilityConfigSchema = z.object({
  version: z.coerce.string().default('1').describe('Configuration schema version'),
  facility: FacilityRefSchema.nullable().optional().describe('Facility used to tag emitted messages'),
  normalizeCase: z.boolean().default(false).describe('Uppercase labels before lookup'),
  accept: z.array(FacilityRefSchema).optional().describe('Facilities accepted on ingestion; all when omitted'),
}).describe('Syslog facility configuration');

export type RawFacilityConfig = z.infer<typeof FacilityConfigSchema>;

export interface FacilityConfig {
  /** Absolute path of the file that was loaded. */
  path: string;
  version: string;
  /** Undefined when no facility is configured. */
  facility: Facility | undefined;
  normalizeCase: boolean;
  /** Sorted by code; empty means accept all. */
  accept: Facility[];
}

export interface LoadConfigOptions {
  /** Directory searched when no explicit path is given. Default: `process.cwd()`. */
  cwd?: string;
  /** Variables for `{{env.NAME}}`. Default: `process.env`. Values from `.env` fill the gaps. */
  env?: EnvContext;
}

export const DEFAULT_CONFIG_FILES = ['facility.yaml', 'facility.yml'] as const;

// =====================================================================
// Facility references
// =====================================================================

const NUMERIC_RE = /^-?\d+$/;

/**
 * Resolve one facility reference from configuration.
 *
 * Numbers and digit strings (optionally signed) are numerical codes;
 * anything else is a label, uppercased first when `normalizeCase` is set. An empty label
 * resolves to `undefined`.
 *
 * @throws {InvalidFacilityCodeError | InvalidFacilityLabelError}
 */
export function resolveFacilityRef(
  ref: string | number,
  options: { normalizeCase?: boolean } = {},
): Facility | undefined {
  if (typeof ref === 'number') {
    return facilityRegistry.fromNumericalCode(ref);
  }
  if (NUMERIC_RE.test(ref)) {
    return facilityRegistry.fromNumericalCodeText(ref);
  }
  return facilityRegistry.fromLabel(options.normalizeCase ? ref.toUpperCase() : ref);
}

// =====================================================================
// Config Loader
// =====================================================================

/**
 * Load and validate a facility configuration file.
 *
 * @param configPath - Explicit path. Defaults to `facility.yaml` or
 *   `facility.yml` in the working directory.
 * @throws {FacilityError} `CONFIG_NOT_FOUND`, `CONFIG_PARSE_FAILED` or `CONFIG_INVALID`
 */
export async function loadFacilityConfig(
  configPath?: string,
  options: LoadConfigOptions = {},
): Promise<FacilityConfig> {
  const cwd = options.cwd ?? process.cwd();
  const resolvedPath = await resolveConfigPath(cwd, configPath);

  const env: EnvContext = {
    ...(await readDotenv(path.dirname(resolvedPath))),
    ...(options.env ?? process.env),
  };

  let rawContent: string;
  try {
    rawContent = await fs.readFile(resolvedPath, 'utf-8');
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      throw new FacilityError('CONFIG_NOT_FOUND', `Configuration file not found: ${resolvedPath}`, {
        path: resolvedPath,
      });
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(rawContent);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new FacilityError('CONFIG_PARSE_FAILED', `YAML syntax error in ${resolvedPath}: ${reason}`, {
      path: resolvedPath,
    });
  }

  if (parsed === null || parsed === undefined || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new FacilityError(
      'CONFIG_PARSE_FAILED',
      `Configuration file is empty or not a valid object: ${resolvedPath}`,
      { path: resolvedPath },
    );
  }

  const result = FacilityConfigSchema.safeParse(resolveObjectVariables(parsed, env));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw invalidConfig(resolvedPath, issues);
  }

  return resolveFacilities(resolvedPath, result.data);
}

// =====================================================================
// Internal Helpers
// =====================================================================

function resolveFacilities(configPath: string, raw: RawFacilityConfig): FacilityConfig {
  const issues: string[] = [];
  const normalizeCase = raw.normalizeCase;

  let facility: Facility | undefined;
  if (raw.facility !== null && raw.facility !== undefined) {
    try {
      facility = resolveFacilityRef(raw.facility, { normalizeCase });
    } catch (err) {
      issues.push(`facility: ${facilityErrorMessage(err)}`);
    }
  }

  const accept: Facility[] = [];
  (raw.accept ?? []).forEach((ref, index) => {
    try {
      const resolved = resolveFacilityRef(ref, { normalizeCase });
      if (resolved === undefined) {
        issues.push(`accept.${index}: must not be empty`);
      } else if (!accept.includes(resolved)) {
        accept.push(resolved);
      }
    } catch (err) {
      issues.push(`accept.${index}: ${facilityErrorMessage(err)}`);
    }
  });

  if (issues.length > 0) {
    throw invalidConfig(configPath, issues);
  }

  return {
    path: configPath,
    version: raw.version,
    facility,
    normalizeCase,
    accept: accept.sort(facilityRegistry.comparator()),
  };
}

function invalidConfig(configPath: string, issues: string[]): FacilityError {
  return new FacilityError(
    'CONFIG_INVALID',
    `Configuration validation failed:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`,
    { path: configPath, issues },
  );
}

/**
 * Resolve the configuration file path.
 * Without an explicit path, looks for `facility.yaml` then `facility.yml`.
 */
async function resolveConfigPath(cwd: string, configPath?: string): Promise<string> {
  if (configPath) {
    return path.resolve(cwd, configPath);
  }

  const candidates = DEFAULT_CONFIG_FILES.map((name) => path.resolve(cwd, name));
  for (const candidate of candidates) {
    const exists = await fs.access(candidate).then(() => true, () => false);
    if (exists) {
      return candidate;
    }
  }

  throw new FacilityError(
    'CONFIG_NOT_FOUND',
    `Configuration file not found. Looked for:\n${candidates.map((c) => `  - ${c}`).join('\n')}`,
    { candidates },
  );
}

async function readDotenv(dir: string): Promise<Record<string, string>> {
  try {
    return dotenv.parse(await fs.readFile(path.join(dir, '.env'), 'utf-8'));
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') {
      return {};
    }
    throw err;
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/** Message of a registry lookup failure; anything else propagates. */
function facilityErrorMessage(err: unknown): string {
  if (err instanceof FacilityError) {
    return err.message;
  }
  throw err;
}
