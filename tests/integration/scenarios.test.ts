import { describe, expect, it } from 'vitest'
import { createRoster } from '../../src/advisors/roster.js'
import { invoke } from '../../src/cli/invoke.js'
import { createContainer } from '../../src/core/container.js'
import { MockFileSystem } from '../../src/core/fs.js'
import { RecordingMemory, RecordingPreflight, abstainer, advisor, fakeShell, silentLogger, testConfig } from '../helpers/fakes.js'

const statusAction = { type: 'command', label: 'Status', params: { command: 'git status --short' } }
const filesAction = { type: 'command', label: 'Files', params: { command: 'git ls-files' } }

function harness(roster = createRoster()) {
    const memory = new RecordingMemory('{"entries_loaded":0,"recent":[]}')
    const shell = fakeShell((command) => ({ stdout: `ran ${command}` }))
    const container = createContainer(testConfig(), {
        logger: silentLogger(),
        fs: new MockFileSystem(),
        shell: shell.run,
        memory,
        preflight: new RecordingPreflight(),
        roster,
    })
    const printed: string[] = []
    const io = { out: (text: string) => printed.push(text) }
    return { container, memory, shell, printed, io }
}

describe('end-to-end scenarios', () => {
    it('A: three approvals with duplicated actions execute two distinct steps', async () => {
        const roster = createRoster({
            Logic: advisor('Logic', { vote: 'approve', rationale: 'inspect', actions: [statusAction, filesAction] }),
            Pragmatic: advisor('Pragmatic', { vote: 'approve', rationale: 'inspect', actions: [statusAction] }),
            Safeguard: abstainer('Safeguard'),
            Efficiency: advisor('Efficiency', { vote: 'approve', rationale: 'files', actions: [filesAction] }),
            HumanImpact: advisor('HumanImpact', { vote: 'reject', rationale: 'not needed', actions: [] }),
        })
        const { container, memory, shell, io, printed } = harness(roster)

        const { exitCode, outcome } = await invoke({ taskText: 'inspect the repo', planOnly: false }, container, io)

        expect(exitCode).toBe(0)
        expect(outcome.plan?.actions.map((a) => [a.params.command, a.originAdvisor])).toEqual([
            ['git status --short', 'Logic'],
            ['git ls-files', 'Logic'],
        ])
        expect(outcome.trace?.map((s) => s.status)).toEqual(['ok', 'ok'])
        expect(shell.calls.map((c) => c.command)).toEqual(['git status --short', 'git ls-files'])
        expect(printed).toEqual([
            [
                'Execution Plan:',
                '1. command - Status',
                '2. command - Files',
                '',
                'Execution Trace:',
                '1. [command] Status => ok',
                '   ran git status --short',
                '2. [command] Files => ok',
                '   ran git ls-files',
            ].join('\n'),
        ])
        expect(memory.events).toHaveLength(1)
    })

    it('B: a Safeguard veto blocks without touching any tool', async () => {
        const { container, memory, shell, io } = harness()

        const { exitCode, outcome } = await invoke(
            { taskText: 'rm -rf / to free space', planOnly: false },
            container,
            io
        )

        expect(exitCode).toBe(0)
        expect(outcome.status).toBe('blocked')
        expect(outcome.plan?.blocked).toBe(true)
        expect(outcome.plan?.blockingReason).toContain('Vetoed by Safeguard')
        expect(outcome.plan?.unblockRequirements).toEqual([
            'Clarify safe environment and target scope.',
            'Provide explicit approval for destructive operations.',
            'Provide rollback/backup strategy.',
        ])
        expect(shell.calls).toEqual([])
        expect(memory.events).toHaveLength(1)
    })

    it('C: plan-only prints the plan, runs nothing and records mode plan', async () => {
        const { container, memory, shell, io, printed } = harness()

        const { exitCode, outcome } = await invoke(
            { taskText: 'verify the build', repoPath: '/work/app', planOnly: true },
            container,
            io
        )

        expect(exitCode).toBe(0)
        expect(outcome.status).toBe('planned')
        expect(printed[0]?.split('\n')).toEqual([
            'Execution Plan:',
            '1. command - Inspect repository',
            '2. command - Locate relevant files',
            '3. run_tests - Run project tests',
            '4. command - Show concise summary',
            '5. command - Quick health check',
            '6. command - Emit operator notice',
        ])
        expect(shell.calls).toEqual([])
        expect(memory.events).toHaveLength(1)
        expect(JSON.parse(memory.events[0]?.content ?? '{}')).toMatchObject({ mode: 'plan', repo: '/work/app' })
    })

    it('is deterministic across repeated plan-only runs', async () => {
        const first = harness()
        const second = harness()
        const a = await invoke({ taskText: 'summarize the repo', planOnly: true }, first.container, first.io)
        const b = await invoke({ taskText: 'summarize the repo', planOnly: true }, second.container, second.io)
        expect(JSON.stringify(a.outcome.plan)).toBe(JSON.stringify(b.outcome.plan))
    })

    it('exits 1 when a step fails and 2 when the audit is lost', async () => {
        const failing = harness()
        const failShell = fakeShell(() => ({ exitCode: 1 }))
        const container = createContainer(testConfig(), {
            logger: silentLogger(),
            fs: new MockFileSystem(),
            shell: failShell.run,
            memory: failing.memory,
            preflight: new RecordingPreflight(),
        })
        const failed = await invoke({ taskText: 'summarize the repo', planOnly: false }, container, failing.io)
        expect(failed.exitCode).toBe(1)

        const lost = createContainer(testConfig(), {
            logger: silentLogger(),
            fs: new MockFileSystem(),
            shell: fakeShell().run,
            memory: new RecordingMemory('', { failWrites: 10 }),
            preflight: new RecordingPreflight(),
        })
        const audit = await invoke({ taskText: 'summarize the repo', planOnly: true }, lost, failing.io)
        expect(audit.exitCode).toBe(2)
    })

    it('gives every session its own controller', () => {
        const { container } = harness()
        expect(container.createSession()).not.toBe(container.createSession())
        expect(container.createSession().sessionId).not.toBe(container.createSession().sessionId)
    })
})
