import path from 'node:path'
import { z } from 'zod'
import type { FileSystem } from '../../core/fs.js'
import { ensureSuccess } from '../shell/runner.js'
import type { CommandOutput, ShellRunner, Tool } from '../types.js'

const RunTestsInput = z.object({})

type RunTestsInput = z.infer<typeof RunTestsInput>

export const NO_TESTS_OUTPUT: CommandOutput = {
    command: 'noop',
    exitCode: 0,
    stdout: 'No tests detected',
    stderr: '',
}

/** Picks the test command for the project at `root`, or null when none is recognised. */
export async function detectTestCommand(fs: FileSystem, root: string): Promise<string | null> {
    if (await fs.exists(path.join(root, 'package.json'))) return 'npm test'

    const entries = await fs.list(root)
    if (entries.some((e) => e.endsWith('.csproj'))) return 'dotnet test'
    // solution files count at any depth
    if ((await fs.listTree(root)).some((e) => e.endsWith('.sln'))) return 'dotnet test'

    if (await fs.exists(path.join(root, 'tests'))) return 'python -m unittest'
    return null
}

export function createRunTestsTool(run: ShellRunner): Tool<RunTestsInput, CommandOutput> {
    return {
        name: 'run_tests',
        description: 'Detect the project type and run its test suite',
        parameters: RunTestsInput,
        async execute(_input, ctx) {
            const command = await detectTestCommand(ctx.fs, ctx.cwd)
            if (!command) return NO_TESTS_OUTPUT
            return ensureSuccess(await run(command, { cwd: ctx.cwd, signal: ctx.signal }))
        },
    }
}
