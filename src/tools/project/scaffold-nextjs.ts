import path from 'node:path'
import { z } from 'zod'
import { ensureSuccess } from '../shell/runner.js'
import type { CommandOutput, ShellRunner, Tool } from '../types.js'

const ScaffoldInput = z.object({
    app_name: z
        .string()
        .regex(/^[a-z0-9][a-z0-9._-]*$/, 'must be a lowercase npm package name')
        .describe('Directory and package name for the new app under apps/'),
})

type ScaffoldInput = z.infer<typeof ScaffoldInput>

export function createScaffoldNextjsTool(run: ShellRunner): Tool<ScaffoldInput, CommandOutput> {
    return {
        name: 'scaffold_nextjs',
        description: 'Create a Next.js app under apps/ with create-next-app',
        parameters: ScaffoldInput,
        async execute(input, ctx) {
            const appsDir = path.join(ctx.cwd, 'apps')
            await ctx.fs.mkdir(appsDir)
            const command = `npx create-next-app@latest ${input.app_name} --yes`
            return ensureSuccess(await run(command, { cwd: appsDir, signal: ctx.signal }))
        },
    }
}
