#!/usr/bin/env node

/**
 * Ops Copilot - CLI Entry Point
 * Interactive conversation shell, or a single question with --query
 */

import { readFile } from 'fs/promises';
import { createCopilot, type Copilot } from './app.js';
import { parseArgs, usageText } from './cli-args.js';
import { ConfigError, DEFAULT_CONFIG_PATH, loadConfigFromFile } from './config/config-loader.js';
import { ConversationShell, streamLineSource } from './interactive/conversation-shell.js';
import { ToolCatalogError } from './tools/tool-catalog.js';
import { UIManager } from './ui/ui-manager.js';

/**
 * Version from package.json, which sits one level above both src/ and dist/
 */
async function readVersion(): Promise<string> {
  const manifest: unknown = JSON.parse(await readFile(new URL('../package.json', import.meta.url), 'utf8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest) {
    return String(manifest.version);
  }
  return 'unknown';
}

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2));
  const ui = new UIManager();
  const version = await readVersion();

  if (parsed.help) {
    ui.log(usageText(version));
    return 0;
  }

  if (parsed.version) {
    ui.log(`ops-copilot v${version}`);
    return 0;
  }

  if (parsed.error) {
    ui.error(ui.status(parsed.error, 'error'));
    ui.log(usageText(version));
    return 1;
  }

  const configPath = parsed.configPath ?? process.env.OPS_COPILOT_CONFIG ?? DEFAULT_CONFIG_PATH;

  let copilot: Copilot;
  try {
    const config = await loadConfigFromFile(configPath);
    ui.debug(`configuration loaded from ${configPath}`);
    copilot = await createCopilot(config, ui);
  } catch (error) {
    if (error instanceof ConfigError || error instanceof ToolCatalogError) {
      ui.error(ui.status(`${error.name}: ${error.message}`, 'error'));
      ui.error(ui.format(`   File: ${error.filePath}`, 'subtle'));
      return 1;
    }
    throw error;
  }

  try {
    if (parsed.query !== undefined) {
      const shell = new ConversationShell(copilot.session, ui);
      const outcome = await shell.handleQuery(parsed.query);
      return outcome.status === 'answered' ? 0 : 1;
    }

    const shell = new ConversationShell(copilot.session, ui, {
      showContext: parsed.showContext ?? false,
      ...(process.stdin.isTTY !== true && { readLine: streamLineSource(process.stdin) }),
    });
    await shell.run();
    return 0;
  } finally {
    await copilot.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
