/**
 * Extension Configuration
 * 
 * Persisted mapping from file extension to destination directory.
 * 
 * File format:
 *   { "extensions": { ".jpg": "/home/me/Pictures" }, "undefinedExtensionPath": null }
 * 
 * A flat `{ ".jpg": "/home/me/Pictures" }` object (older format, and the format
 * of fragments merged with `write --json`) is accepted on read. Hand-edited
 * keys are normalized on read and relative paths resolve against the
 * directory holding the file.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname, extname } from 'node:path';
import { z } from 'zod';
import { errorCode, resolveUserPath, type Logger } from '@file-sorter/utils';
import { ConfigFileError, ValidationError } from '../errors/index.js';
import type { SessionConfig } from '../types/sorting.js';

export const EXTENSION_PATTERN = /^\.[a-z0-9]+$/;

const extensionsSchema = z.record(z.string(), z.string().min(1));

const configFileSchema = z.object({
  extensions: extensionsSchema.default({}),
  undefinedExtensionPath: z.string().min(1).nullable().default(null),
}).strict();

const storedConfigSchema = z.union([
  configFileSchema,
  extensionsSchema.transform(extensions => ({ extensions, undefinedExtensionPath: null })),
]);

export type ExtensionConfig = z.infer<typeof configFileSchema>;

export function emptyConfig(): ExtensionConfig {
  return { extensions: {}, undefinedExtensionPath: null };
}

/**
 * Normalize user input: drop whitespace, lowercase, ensure a leading dot
 */
export function normalizeConfigExtension(raw: string): string {
  const compact = raw.replace(/\s+/g, '').toLowerCase();
  if (compact === '') {
    return compact;
  }
  return compact.startsWith('.') ? compact : `.${compact}`;
}

export function isValidConfigExtension(extension: string): boolean {
  return EXTENSION_PATTERN.test(extension);
}

/**
 * Add or replace the destination of one extension
 */
export function addExtension(
  config: ExtensionConfig,
  rawExtension: string,
  rawPath: string,
  cwd: string = process.cwd()
): ExtensionConfig {
  const extension = normalizeConfigExtension(rawExtension);
  const trimmedPath = rawPath.trim();

  if (!extension || !trimmedPath) {
    throw new ValidationError('extension', `empty extension '${extension}' or empty path '${trimmedPath}'`);
  }
  if (!isValidConfigExtension(extension)) {
    throw new ValidationError('extension', `'${rawExtension}' is not a valid extension`);
  }

  return {
    ...config,
    extensions: { ...config.extensions, [extension]: resolveUserPath(trimmedPath, cwd) },
  };
}

export interface RemoveResult {
  config: ExtensionConfig;
  removed: string[];
  ignored: string[];
}

/**
 * Remove extensions; invalid or unknown ones are reported back, not thrown
 */
export function removeExtensions(config: ExtensionConfig, rawExtensions: readonly string[]): RemoveResult {
  const extensions = { ...config.extensions };
  const removed: string[] = [];
  const ignored: string[] = [];

  for (const raw of rawExtensions) {
    const extension = normalizeConfigExtension(raw);
    if (!isValidConfigExtension(extension) || !(extension in extensions)) {
      ignored.push(raw);
      continue;
    }
    delete extensions[extension];
    removed.push(extension);
  }

  return { config: { ...config, extensions }, removed, ignored };
}

/**
 * Merge a fragment; later keys win over existing ones
 */
export function mergeExtensions(
  config: ExtensionConfig,
  fragment: Readonly<Record<string, string>>,
  cwd: string = process.cwd()
): ExtensionConfig {
  let merged = config;
  for (const [extension, path] of Object.entries(fragment)) {
    merged = addExtension(merged, extension, path, cwd);
  }
  return merged;
}

export function setUndefinedExtensionPath(
  config: ExtensionConfig,
  rawPath: string | null,
  cwd: string = process.cwd()
): ExtensionConfig {
  if (rawPath === null) {
    return { ...config, undefinedExtensionPath: null };
  }
  if (!rawPath.trim()) {
    throw new ValidationError('undefinedExtensionPath', 'path must not be empty');
  }
  return { ...config, undefinedExtensionPath: resolveUserPath(rawPath, cwd) };
}

export interface SelectResult {
  selected: Record<string, string>;
  ignored: string[];
}

export function selectExtensions(config: ExtensionConfig, rawExtensions: readonly string[]): SelectResult {
  const selected: Record<string, string> = {};
  const ignored: string[] = [];

  for (const raw of rawExtensions) {
    const extension = normalizeConfigExtension(raw);
    const path = config.extensions[extension];
    if (!isValidConfigExtension(extension) || path === undefined) {
      ignored.push(raw);
      continue;
    }
    selected[extension] = path;
  }

  return { selected, ignored };
}

export function toSessionConfig(config: ExtensionConfig): SessionConfig {
  return {
    extensionMap: config.extensions,
    undefinedExtensionPolicy: config.undefinedExtensionPath
      ? { kind: 'move-to', path: config.undefinedExtensionPath }
      : { kind: 'skip' },
  };
}

function describeIoFailure(error: unknown): string {
  switch (errorCode(error)) {
    case 'ENOENT':
      return 'File not found';
    case 'EACCES':
    case 'EPERM':
      return 'Permission denied';
    default:
      return 'I/O error';
  }
}

/**
 * Reads and writes the configuration file
 */
export class ExtensionConfigStore {
  private readonly logger: Logger;

  constructor(
    public readonly path: string,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'config-store' });
  }

  /**
   * Read the configuration. A missing file is created empty.
   */
  async read(): Promise<ExtensionConfig> {
    this.logger.debug({ path: this.path }, 'Reading configuration');

    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        this.logger.warn({ path: this.path }, 'Configuration file not found, creating an empty one');
        const config = emptyConfig();
        await this.write(config);
        return config;
      }
      throw new ConfigFileError(this.path, describeIoFailure(error), error);
    }

    const config = this.normalize(this.parse(content, storedConfigSchema));
    this.logger.info({ path: this.path, extensions: Object.keys(config.extensions).length }, 'Read configuration');
    return config;
  }

  async write(config: ExtensionConfig): Promise<void> {
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, JSON.stringify(config, null, 4) + '\n', 'utf-8');
    } catch (error) {
      throw new ConfigFileError(this.path, describeIoFailure(error), error);
    }
    this.logger.info({ path: this.path }, 'Wrote configuration');
  }

  /**
   * Read a flat `{ extension: path }` fragment from a JSON file
   */
  async readFragment(fragmentPath: string): Promise<Record<string, string>> {
    if (extname(fragmentPath).toLowerCase() !== '.json') {
      throw new ConfigFileError(fragmentPath, 'Configs can only be read from json files');
    }

    let content: string;
    try {
      content = await readFile(fragmentPath, 'utf-8');
    } catch (error) {
      throw new ConfigFileError(fragmentPath, describeIoFailure(error), error);
    }

    return this.parse(content, extensionsSchema, fragmentPath);
  }

  private normalize(stored: ExtensionConfig): ExtensionConfig {
    const base = dirname(this.path);
    try {
      const config = mergeExtensions(emptyConfig(), stored.extensions, base);
      return setUndefinedExtensionPath(config, stored.undefinedExtensionPath, base);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new ConfigFileError(this.path, `Invalid configuration (${error.message})`, error);
      }
      throw error;
    }
  }

  private parse<T>(content: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, path: string = this.path): T {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigFileError(path, 'Malformed JSON', error);
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => issue.message).join('; ');
      throw new ConfigFileError(path, `Invalid configuration (${issues})`, parsed.error);
    }
    return parsed.data;
  }
}
