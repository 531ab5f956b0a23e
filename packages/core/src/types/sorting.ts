/**
 * Sorting Types
 *
 * Values shared between the configuration store and the sorting engine.
 */

/**
 * Extension (any case, with or without the leading dot) to absolute destination directory
 */
export type ExtensionMap = Readonly<Record<string, string>>;

/**
 * What happens to files whose extension has no mapping
 */
export type UndefinedExtensionPolicy =
  | { kind: 'skip' }
  | { kind: 'move-to'; path: string };

export interface SessionConfig {
  extensionMap: ExtensionMap;
  undefinedExtensionPolicy: UndefinedExtensionPolicy;
}
