/**
 * Tool Catalog - Declared signatures of the monitoring tools
 * Loaded from a JSON data file and rendered into the planning prompt
 */

import { readFile } from 'fs/promises';
import { ToolCatalogSchema } from '../schemas/config.schema.js';
import type { ParamValue, ToolParameter, ToolSignature } from '../types/index.js';

/**
 * Error thrown when the catalog file cannot be read or validated
 */
export class ToolCatalogError extends Error {
  constructor(message: string, public readonly filePath: string) {
    super(message);
    this.name = 'ToolCatalogError';
  }
}

/**
 * Parse and validate catalog JSON content
 *
 * @param content - Raw JSON text
 * @param filePath - Used in error messages
 */
export function parseToolCatalog(content: string, filePath: string): ToolSignature[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ToolCatalogError(
      `Tool catalog is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  const validation = ToolCatalogSchema.safeParse(data);
  if (!validation.success) {
    const errorMessages = validation.error.errors
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');
    throw new ToolCatalogError(`Tool catalog validation failed:\n${errorMessages}`, filePath);
  }

  const names = new Set<string>();
  for (const tool of validation.data.tools) {
    if (names.has(tool.name)) {
      throw new ToolCatalogError(`Duplicate tool name: '${tool.name}'`, filePath);
    }
    names.add(tool.name);
  }

  return validation.data.tools;
}

export async function loadToolCatalog(filePath: string): Promise<ToolSignature[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ToolCatalogError(
      `Failed to read tool catalog: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }
  return parseToolCatalog(content, filePath);
}

function formatDefault(value: ParamValue): string {
  if (value === null) return 'None';
  if (typeof value === 'string') return `'${value}'`;
  return JSON.stringify(value);
}

function formatParameter(param: ToolParameter): string {
  const base = `${param.name}: ${param.type}`;
  return param.default === undefined ? base : `${base} = ${formatDefault(param.default)}`;
}

/**
 * Render one signature the way the planner sees it
 *
 * @example
 * formatSignature({ name: 'pods_exceeding_cpu', parameters: [{ name: 'threshold', type: 'float', default: 0.8 }] })
 * → 'pods_exceeding_cpu(threshold: float = 0.8)'
 */
export function formatSignature(tool: ToolSignature): string {
  return `${tool.name}(${tool.parameters.map(formatParameter).join(', ')})`;
}

/**
 * Render the whole catalog as a bullet list for prompts
 */
export function formatCatalogForPrompt(tools: ToolSignature[]): string {
  return tools
    .map((tool) =>
      tool.description ? `- ${formatSignature(tool)}: ${tool.description}` : `- ${formatSignature(tool)}`
    )
    .join('\n');
}
