import { execaCommand } from 'execa'
import type { CommandOutput, ShellRunner } from '../types.js'

export function describeCommandFailure(output: CommandOutput): string {
    if (output.reason) return `'${output.command}' failed to run: ${output.reason}`
    const detail = output.stderr.trim().split('\n').slice(-5).join('\n')
    return `'${output.command}' exited with code ${output.exitCode}${detail ? `: ${detail}` : ''}`
}

export class CommandFailedError extends Error {
    constructor(readonly output: CommandOutput) {
        super(describeCommandFailure(output))
        this.name = 'CommandFailedError'
    }
}

export const runShell: ShellRunner = async (command, opts) => {
    const result = await execaCommand(command, {
        cwd: opts.cwd,
        shell: true,
        reject: false,
        cancelSignal: opts.signal,
    })
    const output: CommandOutput = {
        command,
        exitCode: result.exitCode ?? -1,
        stdout: result.stdout,
        stderr: result.stderr,
    }
    if (result.failed && result.exitCode === undefined) {
        const reason = [result.originalMessage, result.shortMessage].find(
            (message): message is string => typeof message === 'string' && message.length > 0
        )
        output.reason = reason ?? 'process did not exit'
    }
    return output
}

export function ensureSuccess(output: CommandOutput): CommandOutput {
    if (output.exitCode !== 0) throw new CommandFailedError(output)
    return output
}
