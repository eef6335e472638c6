import { createRunTestsTool } from './project/run-tests.js'
import { createScaffoldNextjsTool } from './project/scaffold-nextjs.js'
import { ToolRegistry } from './registry.js'
import { createCommandTool } from './shell/command.js'
import { runShell } from './shell/runner.js'
import type { ShellRunner } from './types.js'

export function createToolRegistry(run: ShellRunner = runShell): ToolRegistry {
    const registry = new ToolRegistry()

    registry.register(createCommandTool(run))
    registry.register(createRunTestsTool(run))
    registry.register(createScaffoldNextjsTool(run))

    return registry
}
