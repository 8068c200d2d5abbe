import type { SessionRegistry } from './session-registry.js';
import type { ModelToolSchema, ToolDescriptor } from '../types.js';

export const TOOL_NAME_SEPARATOR = '__';

export type ToolCatalog = Map<string, ToolDescriptor>;

export const fullToolName = (serverName: string, toolName: string): string => `${serverName}${TOOL_NAME_SEPARATOR}${toolName}`;

/**
 * Flatten every connected server's tools into one `server__tool` namespace.
 * Always rebuilt from the registry so it reflects the current membership.
 */
export function buildCatalog(registry: Pick<SessionRegistry, 'listTools'>): ToolCatalog {
  const catalog: ToolCatalog = new Map();
  registry.listTools().forEach((tool) => {
    catalog.set(fullToolName(tool.serverName, tool.name), tool);
  });
  return catalog;
}

export function toModelSchema(catalog: ToolCatalog): ModelToolSchema[] {
  return Array.from(catalog.entries()).map(([name, tool]) => ({
    type: 'function',
    function: {
      name,
      description: tool.description.length > 0 ? tool.description : `Tool ${tool.name} from ${tool.serverName}`,
      parameters: Object.keys(tool.inputSchema).length > 0
        ? tool.inputSchema
        : { type: 'object', properties: {}, required: [] },
    },
  }));
}

/**
 * Split a model-facing tool name into server and tool. Names the catalog knows win; otherwise the
 * first separator splits. A name that matches neither yields an empty server name.
 */
export function resolveToolName(name: string, catalog?: ToolCatalog): { serverName: string; toolName: string } {
  const known = catalog?.get(name);
  if (known !== undefined) return { serverName: known.serverName, toolName: known.name };
  const idx = name.indexOf(TOOL_NAME_SEPARATOR);
  if (idx > 0) {
    return { serverName: name.slice(0, idx), toolName: name.slice(idx + TOOL_NAME_SEPARATOR.length) };
  }
  const byToolName = catalog !== undefined ? Array.from(catalog.values()).filter((tool) => tool.name === name) : [];
  if (byToolName.length === 1) return { serverName: byToolName[0].serverName, toolName: byToolName[0].name };
  return { serverName: '', toolName: name };
}
