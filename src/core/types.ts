export const ADVISOR_IDS = ['Logic', 'Pragmatic', 'Safeguard', 'Efficiency', 'HumanImpact'] as const

export type AdvisorId = (typeof ADVISOR_IDS)[number]

export type Vote = 'approve' | 'reject' | 'abstain' | 'veto'

export type Mode = 'plan' | 'exec'

export type ParamValue = string | number | boolean | null

export type ActionParams = Readonly<Record<string, ParamValue>>

export interface Task {
    readonly text: string
    readonly repoPath?: string
    readonly mode: Mode
}

export interface Action {
    readonly type: string
    readonly params: ActionParams
    readonly originAdvisor: AdvisorId
    readonly label?: string
}

export interface Proposal {
    readonly advisorId: AdvisorId
    readonly vote: Vote
    readonly rationale: string
    readonly actions: readonly Action[]
    readonly risks: readonly string[]
    readonly unblockRequirements: readonly string[]
    /** Set when the advisor failed and the proposal was coerced to an empty abstain. */
    readonly fault?: string
}

export interface Plan {
    readonly blocked: boolean
    readonly blockingReason: string | null
    readonly unblockRequirements: readonly string[]
    readonly actions: readonly Action[]
    readonly approvals: readonly AdvisorId[]
}

export type StepStatus = 'ok' | 'failed' | 'skipped'

export type StepErrorKind = 'UnknownActionType' | 'InvalidParams' | 'ToolExecutionFailure'

export interface StepError {
    readonly kind: StepErrorKind
    readonly message: string
}

export interface StepResult {
    readonly action: Action
    readonly status: StepStatus
    readonly output?: unknown
    readonly error?: StepError
}

export type ExecutionTrace = readonly StepResult[]

export type SessionState =
    | 'INIT'
    | 'PREFLIGHT'
    | 'MEMORY_LOADED'
    | 'DELIBERATED'
    | 'MERGED'
    | 'PLAN_ONLY_DONE'
    | 'EXECUTED'
    | 'LOGGED'

export type SessionStatus = 'planned' | 'completed' | 'blocked' | 'failed' | 'error'
