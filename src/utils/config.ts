import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import type { ExportConfig } from '../types.js';
import { defaultSelectors } from '../scraper/selectors.js';
import { logger } from './logger.js';

export const CONFIG_FILENAME = 'docs-to-pdf.json';

/**
 * Print stylesheet injected into every page: hides site chrome (sidebar,
 * header, on-page TOC, prev/next buttons) and lets the content flow.
 * Selectors match mdBook's default theme.
 */
export const DEFAULT_PRINT_CSS = `
@media print {
  #sidebar, .header-bar, .toc-container, .footer-buttons, .nav-chapters, #menu-bar {
    display: none;
  }
}

body, #body-container {
  height: auto;
  overflow: auto;
}

#content {
  font-weight: 500;
}

#content, blockquote > p, table {
  font-size: 0.8em;
}
`;

/**
 * Returns the default export configuration.
 */
export function getDefaultConfig(): ExportConfig {
  return {
    outputDir: './docs-pdf',
    title: 'Documentation',
    toc: {
      selectors: { ...defaultSelectors },
    },
    render: {
      format: 'Letter',
      margin: { top: '0.45in', right: '0.45in', bottom: '0.45in', left: '0.45in' },
      printBackground: false,
      waitUntil: 'load',
      timeoutMs: 60_000,
      customCss: DEFAULT_PRINT_CSS,
      overwrite: false,
    },
    merge: true,
  };
}

export type PlainObject = { [key: string]: unknown };

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-merge `overrides` into `base`.  Arrays are replaced, not
 * concatenated, and `undefined` overrides are ignored so that absent CLI
 * flags do not clobber file values.
 */
export function deepMerge(base: PlainObject, overrides: PlainObject): PlainObject {
  const result: PlainObject = { ...base };

  for (const [key, overrideVal] of Object.entries(overrides)) {
    if (overrideVal === undefined) continue;

    const baseVal = result[key];
    result[key] =
      isPlainObject(baseVal) && isPlainObject(overrideVal)
        ? deepMerge(baseVal, overrideVal)
        : overrideVal;
  }

  return result;
}

/**
 * Merge configuration sources with increasing priority:
 *   defaults < fileConfig < cliArgs
 *
 * @throws Error when the merged result is not a valid configuration.
 */
export function mergeConfigs(
  defaults: ExportConfig,
  fileConfig: PlainObject,
  cliArgs: PlainObject,
): ExportConfig {
  const merged = deepMerge(deepMerge({ ...defaults }, fileConfig), cliArgs);
  return validateConfig(merged);
}

/**
 * Read a JSON configuration file.  A missing file yields `{}`; a file
 * that is not a JSON object is an error.
 */
export async function loadConfigFile(configPath?: string): Promise<PlainObject> {
  const resolvedPath = resolve(configPath ?? CONFIG_FILENAME);

  let raw: string;
  try {
    raw = await readFile(resolvedPath, 'utf-8');
  } catch (error: unknown) {
    if (isErrnoException(error) && error.code === 'ENOENT' && configPath === undefined) {
      logger.debug(`No config file found at ${resolvedPath}, using defaults`);
      return {};
    }
    throw new Error(
      `Failed to read config at ${resolvedPath}: ` +
        (error instanceof Error ? error.message : String(error)),
    );
  }

  const parsed: unknown = JSON.parse(raw);
  if (!isPlainObject(parsed)) {
    throw new Error(`Config at ${resolvedPath} must be a JSON object`);
  }
  logger.debug(`Loaded config from ${resolvedPath}`);
  return parsed;
}

/**
 * Resolve the effective config: defaults, then the file at `configPath`
 * (or `docs-to-pdf.json` in the working directory), then `cliArgs`.
 */
export async function loadConfig(
  configPath?: string,
  cliArgs: PlainObject = {},
): Promise<ExportConfig> {
  return mergeConfigs(getDefaultConfig(), await loadConfigFile(configPath), cliArgs);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

// ── Validation ───────────────────────────────────────────────────────

const LOAD_STATES = ['load', 'domcontentloaded', 'networkidle'] as const;

function expectString(obj: PlainObject, key: string, path: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw new Error(`Config "${path}${key}" must be a string`);
  }
  return value;
}

function optionalString(obj: PlainObject, key: string, path: string): string | undefined {
  return obj[key] === undefined ? undefined : expectString(obj, key, path);
}

function expectBoolean(obj: PlainObject, key: string, path: string): boolean {
  const value = obj[key];
  if (typeof value !== 'boolean') {
    throw new Error(`Config "${path}${key}" must be a boolean`);
  }
  return value;
}

function expectObject(obj: PlainObject, key: string, path: string): PlainObject {
  const value = obj[key];
  if (!isPlainObject(value)) {
    throw new Error(`Config "${path}${key}" must be an object`);
  }
  return value;
}

/**
 * Check a merged configuration object field by field and return it typed.
 */
export function validateConfig(raw: PlainObject): ExportConfig {
  const toc = expectObject(raw, 'toc', '');
  const selectors = expectObject(toc, 'selectors', 'toc.');
  const render = expectObject(raw, 'render', '');
  const margin = expectObject(render, 'margin', 'render.');

  const waitUntil = expectString(render, 'waitUntil', 'render.');
  const loadState = LOAD_STATES.find((state) => state === waitUntil);
  if (!loadState) {
    throw new Error(`Config "render.waitUntil" must be one of ${LOAD_STATES.join(', ')}`);
  }

  const timeoutMs = render.timeoutMs;
  if (typeof timeoutMs !== 'number' || !(timeoutMs >= 0)) {
    throw new Error('Config "render.timeoutMs" must be a non-negative number');
  }

  return {
    url: optionalString(raw, 'url', ''),
    outputDir: expectString(raw, 'outputDir', ''),
    output: optionalString(raw, 'output', ''),
    title: expectString(raw, 'title', ''),
    toc: {
      startAt: optionalString(toc, 'startAt', 'toc.'),
      stopBefore: optionalString(toc, 'stopBefore', 'toc.'),
      selectors: {
        sidebar: expectString(selectors, 'sidebar', 'toc.selectors.'),
        item: expectString(selectors, 'item', 'toc.selectors.'),
      },
    },
    render: {
      format: expectString(render, 'format', 'render.'),
      margin: {
        top: expectString(margin, 'top', 'render.margin.'),
        right: expectString(margin, 'right', 'render.margin.'),
        bottom: expectString(margin, 'bottom', 'render.margin.'),
        left: expectString(margin, 'left', 'render.margin.'),
      },
      printBackground: expectBoolean(render, 'printBackground', 'render.'),
      waitUntil: loadState,
      timeoutMs,
      customCss: expectString(render, 'customCss', 'render.'),
      overwrite: expectBoolean(render, 'overwrite', 'render.'),
    },
    merge: expectBoolean(raw, 'merge', ''),
  };
}
