import path from 'node:path'
import { CollaboratorUnavailableError } from '../core/errors.js'
import type { FileSystem } from '../core/fs.js'
import type { ResolvedConfig } from '../config/schema.js'
import type { Logger } from '../logger/index.js'
import { describeCommandFailure, runShell } from '../tools/shell/runner.js'
import type { ShellRunner } from '../tools/types.js'

export const START_SCRIPT = path.join('scripts', 'start.sh')

/** Best-effort environment setup run before a session consults memory. */
export interface Preflight {
    run(cwd: string): Promise<void>
}

export class PreflightRunner implements Preflight {
    constructor(
        private config: ResolvedConfig['preflight'],
        private fs: FileSystem,
        private logger: Logger,
        private shell: ShellRunner = runShell
    ) {}

    async resolveCommand(cwd: string): Promise<string | null> {
        if (!this.config.enabled) return null
        if (this.config.command) return this.config.command
        if (await this.fs.exists(path.join(cwd, START_SCRIPT))) return `bash ${START_SCRIPT}`
        return null
    }

    async run(cwd: string): Promise<void> {
        const command = await this.resolveCommand(cwd)
        if (!command) {
            this.logger.debug({ cwd }, 'preflight:skip')
            return
        }

        const output = await this.shell(command, { cwd, signal: AbortSignal.timeout(this.config.timeout) })
        if (output.exitCode !== 0) {
            throw new CollaboratorUnavailableError('preflight', `Preflight ${describeCommandFailure(output)}`)
        }
        this.logger.debug({ command }, 'preflight:success')
    }
}
