/**
 * Read Command
 *
 * Prints `extension: path` lines for all or some configured extensions.
 */

import { ExtensionConfigStore, selectExtensions } from '@file-sorter/core';
import type { CliContext } from '../lib/context.js';
import { printInfo, printWarning } from '../lib/output.js';

export async function readCommand(extensions: readonly string[], context: CliContext): Promise<void> {
  const store = new ExtensionConfigStore(context.config.configFile, context.logger);
  const config = await store.read();

  if (extensions.length === 0) {
    const entries = Object.entries(config.extensions);
    if (entries.length === 0) {
      printInfo('No extensions configured');
    }
    for (const [extension, path] of entries) {
      console.log(`${extension}: ${path}`);
    }
    if (config.undefinedExtensionPath) {
      console.log(`undefined extensions: ${config.undefinedExtensionPath}`);
    }
    return;
  }

  const { selected, ignored } = selectExtensions(config, extensions);
  for (const raw of ignored) {
    printWarning(`Not configured: ${raw}`);
  }
  for (const [extension, path] of Object.entries(selected)) {
    console.log(`${extension}: ${path}`);
  }
}
