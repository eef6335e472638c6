import { z } from 'zod'
import type { CommandOutput, ShellRunner, Tool } from '../types.js'
import { ensureSuccess } from './runner.js'

const CommandInput = z.object({
    command: z.string().min(1).describe('Shell command to run in the repository'),
})

type CommandInput = z.infer<typeof CommandInput>

export function createCommandTool(run: ShellRunner): Tool<CommandInput, CommandOutput> {
    return {
        name: 'command',
        description: 'Run a shell command in the repository; a non-zero exit fails the step',
        parameters: CommandInput,
        async execute(input, ctx) {
            return ensureSuccess(await run(input.command, { cwd: ctx.cwd, signal: ctx.signal }))
        },
    }
}
