import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import type { AuthContext } from './types.js';

export type ToolHandler = (args: Record<string, unknown>, auth: AuthContext) => CallToolResult | Promise<CallToolResult>;

export interface ToolDefinition {
    name: string;
    title?: string;
    description: string;
    /** JSON Schema of the arguments object, published as-is in `tools/list`. */
    inputSchema: Tool['inputSchema'];
    /**
     * Executes the tool. Throwing reports a tool-level failure to the caller; it is never a
     * protocol error.
     */
    handler: ToolHandler;
}

/**
 * Catalog of the operations exposed through `tools/call`. Adding a tool is a registration.
 */
export class ToolRegistry {
    private tools = new Map<string, ToolDefinition>();

    constructor(definitions: ToolDefinition[] = []) {
        definitions.forEach((definition) => this.register(definition));
    }

    register(definition: ToolDefinition): this {
        if (this.tools.has(definition.name)) {
            throw new Error(`Tool ${definition.name} is already registered`);
        }
        this.tools.set(definition.name, definition);
        return this;
    }

    get(name: string): ToolDefinition | undefined {
        return this.tools.get(name);
    }

    has(name: string): boolean {
        return this.tools.has(name);
    }

    /** The public catalog, in registration order. */
    list(): Tool[] {
        return [...this.tools.values()].map(({ name, title, description, inputSchema }) => ({
            name,
            ...(title !== undefined && { title }),
            description,
            inputSchema,
        }));
    }
}

/** Result for a successful call whose payload is JSON. */
export function jsonResult(payload: Record<string, unknown>): CallToolResult {
    return {
        content: [{ type: 'text', text: JSON.stringify(payload) }],
        structuredContent: payload,
    };
}

/** A failed call, reported in-band so the model can read the reason and correct itself. */
export function toolFailure(message: string): CallToolResult {
    const payload = { success: false, error: message };
    return {
        content: [{ type: 'text', text: JSON.stringify(payload) }],
        structuredContent: payload,
        isError: true,
    };
}
