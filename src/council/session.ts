import { randomUUID } from 'node:crypto'
import path from 'node:path'
import type { Roster } from '../advisors/types.js'
import { errorMessage } from '../core/errors.js'
import type { TypedEventEmitter } from '../core/events.js'
import type { FileSystem } from '../core/fs.js'
import { type RetryOptions, withRetry } from '../core/retry.js'
import type { ExecutionTrace, Plan, Proposal, SessionState, SessionStatus, Task } from '../core/types.js'
import type { Logger } from '../logger/index.js'
import type { MemoryStore } from '../memory/types.js'
import type { Preflight } from '../preflight/runner.js'
import type { ToolRegistry } from '../tools/registry.js'
import { PlanExecutor } from '../tools/executor.js'
import { deliberate } from './deliberation.js'
import { formatPlan, formatTrace, summarizeTrace } from './format.js'
import { merge } from './merger.js'

export interface SessionDeps {
    roster: Roster
    registry: ToolRegistry
    memory: MemoryStore
    preflight: Preflight
    fs: FileSystem
    logger: Logger
    eventBus?: TypedEventEmitter
    projectDir: string
    toolTimeoutMs: number
    auditImportance: number
    auditRetry: RetryOptions
}

export interface SessionOutcome {
    sessionId: string
    status: SessionStatus
    task: Task
    cwd: string
    proposals: readonly Proposal[]
    plan: Plan | null
    trace: ExecutionTrace | null
    /** What the user sees: the plan, the blocking reason, or the full trace. */
    text: string
    error?: string
    /** False when the audit write to memory was lost. */
    audited: boolean
    states: readonly SessionState[]
}

type Draft = Omit<SessionOutcome, 'audited' | 'states' | 'text'>

export function renderOutcome(draft: Pick<Draft, 'status' | 'plan' | 'trace' | 'error'>): string {
    const parts: string[] = []
    if (draft.plan) parts.push(formatPlan(draft.plan))
    if (draft.trace) parts.push(formatTrace(draft.trace))
    if (draft.status === 'error') parts.push(`Error: ${draft.error ?? 'unknown error'}`)
    return parts.join('\n\n')
}

/** Structured record written to memory once per session. */
export function auditRecord(draft: Draft): Record<string, unknown> {
    const record: Record<string, unknown> = {
        session: draft.sessionId,
        task: draft.task.text,
        repo: draft.cwd,
        mode: draft.task.mode,
        status: draft.status,
    }
    if (draft.plan?.blocked) {
        record.blockingReason = draft.plan.blockingReason
    } else if (draft.plan) {
        record.plan = draft.plan.actions.map((a) => ({
            type: a.type,
            params: a.params,
            origin: a.originAdvisor,
        }))
    }
    if (draft.trace) {
        record.trace = summarizeTrace(draft.trace)
        const failedIndex = draft.trace.findIndex((s) => s.status === 'failed')
        const failedStep = draft.trace[failedIndex]
        if (failedStep?.error) {
            record.failedStep = { index: failedIndex, type: failedStep.action.type, ...failedStep.error }
        }
    }
    const faults = draft.proposals.filter((p) => p.fault).map((p) => ({ advisor: p.advisorId, reason: p.fault }))
    if (faults.length > 0) record.faults = faults
    if (draft.error) record.error = draft.error
    return record
}

/**
 * Drives one task from preflight to the audit write. A controller runs once;
 * concurrent callers each get their own instance.
 */
export class SessionController {
    readonly sessionId = randomUUID()
    private state: SessionState = 'INIT'
    private readonly states: SessionState[] = ['INIT']

    constructor(private deps: SessionDeps) {}

    async run(task: Task): Promise<SessionOutcome> {
        if (this.state !== 'INIT') {
            throw new Error(`Session ${this.sessionId} already ran (state ${this.state})`)
        }

        const { logger } = this.deps
        const cwd = path.resolve(this.deps.projectDir, task.repoPath ?? '.')
        const draft: Draft = {
            sessionId: this.sessionId,
            status: 'error',
            task,
            cwd,
            proposals: [],
            plan: null,
            trace: null,
        }

        try {
            this.transition('PREFLIGHT')
            await this.runPreflight(cwd)

            const summary = await this.loadMemory()
            this.transition('MEMORY_LOADED')

            draft.proposals = await deliberate(task, summary, this.deps.roster, {
                logger,
                eventBus: this.deps.eventBus,
            })
            this.transition('DELIBERATED')

            const plan = merge(draft.proposals)
            draft.plan = plan
            this.transition('MERGED')

            if (plan.blocked) {
                draft.status = 'blocked'
            } else if (task.mode === 'plan') {
                this.transition('PLAN_ONLY_DONE')
                draft.status = 'planned'
            } else {
                const executor = new PlanExecutor(this.deps.registry, {
                    fs: this.deps.fs,
                    cwd,
                    toolTimeoutMs: this.deps.toolTimeoutMs,
                    logger,
                    eventBus: this.deps.eventBus,
                })
                const trace = await executor.execute(plan)
                draft.trace = trace
                this.transition('EXECUTED')
                const failed = trace.find((s) => s.status === 'failed')
                draft.status = failed ? 'failed' : 'completed'
                if (failed?.error) draft.error = failed.error.message
            }
        } catch (error) {
            draft.status = 'error'
            draft.error = errorMessage(error)
            logger.error({ err: error, sessionId: this.sessionId, state: this.state }, 'session:error')
        }

        const audited = await this.audit(draft)
        this.transition('LOGGED')
        this.deps.eventBus?.emit('session:end', { sessionId: this.sessionId, status: draft.status, audited })

        return {
            ...draft,
            text: renderOutcome(draft),
            audited,
            states: Object.freeze([...this.states]),
        }
    }

    private transition(next: SessionState): void {
        this.state = next
        this.states.push(next)
        this.deps.logger.debug({ sessionId: this.sessionId, state: next }, 'session:state')
        this.deps.eventBus?.emit('session:state', { sessionId: this.sessionId, state: next })
    }

    private async runPreflight(cwd: string): Promise<void> {
        try {
            await this.deps.preflight.run(cwd)
        } catch (error) {
            this.deps.logger.warn({ err: error }, 'preflight:failed')
        }
    }

    private async loadMemory(): Promise<string> {
        try {
            return await this.deps.memory.readSummary()
        } catch (error) {
            this.deps.logger.warn({ err: error }, 'memory:unavailable')
            return ''
        }
    }

    private async audit(draft: Draft): Promise<boolean> {
        const content = JSON.stringify(auditRecord(draft))
        try {
            await withRetry(
                () => this.deps.memory.writeEvent(content, 'event', this.deps.auditImportance),
                this.deps.auditRetry,
                (error, attempt) => this.deps.logger.warn({ err: error, attempt }, 'audit:retry')
            )
            return true
        } catch (error) {
            this.deps.logger.error({ err: error, sessionId: this.sessionId }, 'audit:lost')
            return false
        }
    }
}
