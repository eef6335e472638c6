import { zodToJsonSchema } from 'zod-to-json-schema'
import type { AnyTool } from './types.js'

export interface ToolDefinition {
    type: string
    description: string
    parameters: Record<string, unknown>
}

export class ToolRegistry {
    private tools = new Map<string, AnyTool>()

    register(tool: AnyTool): void {
        if (this.tools.has(tool.name)) {
            throw new Error(`Tool for action type '${tool.name}' is already registered`)
        }
        this.tools.set(tool.name, tool)
    }

    get(type: string): AnyTool | undefined {
        return this.tools.get(type)
    }

    has(type: string): boolean {
        return this.tools.has(type)
    }

    listAll(): AnyTool[] {
        return [...this.tools.values()]
    }

    getDefinitions(): ToolDefinition[] {
        return this.listAll().map((tool) => ({
            type: tool.name,
            description: tool.description,
            parameters: zodToJsonSchema(tool.parameters, { $refStrategy: 'none' }) as Record<string, unknown>,
        }))
    }
}
