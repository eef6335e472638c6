import { PlanBlockedError, ToolTimeoutError, errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { FileSystem } from '../core/fs.js'
import type { Action, ExecutionTrace, Plan, StepErrorKind, StepResult } from '../core/types.js'
import { formatZodIssues } from '../core/validation.js'
import type { Logger } from '../logger/index.js'
import type { ToolRegistry } from './registry.js'

export interface ExecutorOptions {
    fs: FileSystem
    cwd: string
    toolTimeoutMs: number
    logger?: Logger
    eventBus?: TypedEventEmitter
}

function failed(action: Action, kind: StepErrorKind, message: string): StepResult {
    return { action, status: 'failed', error: { kind, message } }
}

function withTimeout<T>(promise: Promise<T>, ms: number, controller: AbortController): Promise<T> {
    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = new ToolTimeoutError(ms)
            controller.abort(error)
            reject(error)
        }, ms)
    })
    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer))
}

/**
 * Runs a merged plan one action at a time. The first failed step halts the
 * plan; every action after it is recorded as skipped.
 */
export class PlanExecutor {
    constructor(
        private registry: ToolRegistry,
        private options: ExecutorOptions
    ) {}

    async execute(plan: Plan): Promise<ExecutionTrace> {
        if (plan.blocked) throw new PlanBlockedError(plan.blockingReason)

        const trace: StepResult[] = []
        let halted = false

        for (const [index, action] of plan.actions.entries()) {
            if (halted) {
                trace.push({ action, status: 'skipped' })
                continue
            }

            this.options.eventBus?.emit('step:start', { index, type: action.type, label: action.label })
            const started = Date.now()
            const result = await this.runStep(action)
            this.options.eventBus?.emit('step:complete', {
                index,
                type: action.type,
                status: result.status,
                duration: Date.now() - started,
            })

            trace.push(result)
            if (result.status === 'failed') {
                halted = true
                this.options.logger?.warn({ index, type: action.type, error: result.error }, 'step:failed')
            }
        }

        return Object.freeze(trace.map((step) => Object.freeze(step)))
    }

    private async runStep(action: Action): Promise<StepResult> {
        const tool = this.registry.get(action.type)
        if (!tool) {
            return failed(action, 'UnknownActionType', `No tool registered for action type '${action.type}'`)
        }

        const parsed = tool.parameters.safeParse(action.params)
        if (!parsed.success) {
            return failed(action, 'InvalidParams', `Invalid params for ${action.type}: ${formatZodIssues(parsed.error)}`)
        }

        const controller = new AbortController()
        try {
            const output = await withTimeout(
                tool.execute(parsed.data, { fs: this.options.fs, cwd: this.options.cwd, signal: controller.signal }),
                this.options.toolTimeoutMs,
                controller
            )
            return { action, status: 'ok', output }
        } catch (error) {
            return failed(action, 'ToolExecutionFailure', `Tool '${action.type}' failed: ${errorMessage(error)}`)
        }
    }
}
